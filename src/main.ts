import { Dotfield } from './dotfield';
import { AudioPeakIntensitySource } from './intensity';
import { screenPanOffset } from './background';
import type { DotfieldConfig } from './types';

// Demo page. Query parameters:
//   ?bg=<url>  points=<n>  style=billboard|point  buffer=single|ping-pong  pan=1

function configFromQuery(canvas: HTMLCanvasElement, params: URLSearchParams): DotfieldConfig {
  const config: DotfieldConfig = { canvas };
  const bg = params.get('bg');
  if (bg) config.backgroundImage = bg;
  const points = params.get('points');
  if (points) config.pointCount = Number(points);
  const style = params.get('style');
  if (style === 'billboard' || style === 'point') config.particleStyle = style;
  const buffer = params.get('buffer');
  if (buffer === 'single' || buffer === 'ping-pong') config.bufferMode = buffer;
  return config;
}

async function main() {
  const overlay = document.getElementById('overlay');
  const canvas = document.getElementById('canvas');
  if (!overlay || !(canvas instanceof HTMLCanvasElement)) {
    throw new Error('demo page is missing #overlay or #canvas');
  }
  const params = new URLSearchParams(window.location.search);

  overlay.textContent = 'dotfield: initializing...';

  let dotfield: Dotfield;
  try {
    dotfield = await Dotfield.create({
      ...configFromQuery(canvas, params),
      onDeviceLost: (reason) => {
        overlay.textContent = `GPU device lost: ${reason}`;
      },
      onError: (err) => {
        overlay.textContent = `Stopped: ${err instanceof Error ? err.message : String(err)}`;
      },
    });
  } catch (err) {
    overlay.textContent = `Startup failed: ${err instanceof Error ? err.message : String(err)}`;
    throw err;
  }

  const resizeCanvas = () => {
    const dpr = window.devicePixelRatio || 1;
    dotfield.resize(canvas.clientWidth * dpr, canvas.clientHeight * dpr);
  };
  resizeCanvas();
  window.addEventListener('resize', resizeCanvas);

  // Keep a screen-sized background fixed to the screen while the window moves.
  if (params.get('pan') === '1') {
    dotfield.addHook('preTick', () => {
      const [x, y] = screenPanOffset(window.screenX, window.screenY, window.innerHeight, window.screen.height);
      dotfield.setWindowPos(x, y);
    });
  }

  // Autoplay policy: the microphone can only start from a user gesture.
  canvas.addEventListener('click', () => {
    navigator.mediaDevices.getUserMedia({ audio: true })
      .then(async (stream) => {
        const source = new AudioPeakIntensitySource(stream);
        await source.resume();
        dotfield.setIntensitySource(source);
      })
      .catch((err: unknown) => {
        console.warn('[dotfield] microphone unavailable', err);
      });
  }, { once: true });

  document.addEventListener('visibilitychange', () => {
    if (document.hidden) dotfield.pause();
    else dotfield.resume();
  });

  dotfield.addHook('frameEnd', () => {
    const s = dotfield.stats;
    overlay.textContent =
      `dotfield | FPS: ${s.fps} | Points: ${s.pointCount} | Intensity: ${s.intensity.toFixed(2)}`;
  });

  dotfield.start();
}

main().catch((err: unknown) => {
  console.error('[dotfield] demo failed', err);
});
