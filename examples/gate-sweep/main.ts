import { Plot2D, createDataSource, createPlotContext } from '../../src/index';
import type { Plot2DRenderer, PlotFrame, Plot2DBinding } from '../../src/index';

type SweepConfig = Readonly<{
  points: number;
  tickMs: number;
  vStart: number;
  vStop: number;
}>;

const DEFAULT_SWEEP: SweepConfig = {
  points: 40,
  tickMs: 50,
  vStart: -1,
  vStop: 1,
};

// Prints one status line per redraw instead of drawing.
const createConsoleRenderer = (): Plot2DRenderer => {
  const labels = { x: '', y: '' };
  return {
    render(frame: PlotFrame<Plot2DBinding>) {
      const counts = frame.bindings.map((b) => b.source.getPointCount()).join(', ');
      console.log(`[${frame.name}] ${labels.y} vs ${labels.x}: ${counts} points`);
    },
    setXLabel(label) {
      labels.x = label;
    },
    setYLabel(label) {
      labels.y = label;
    },
  };
};

const context = createPlotContext();

const sweep = createDataSource({
  name: 'gate-sweep',
  columns: [
    { name: 'Gate voltage', units: 'V', type: 'coordinate' },
    { name: 'Current', units: 'nA', type: 'value' },
  ],
});

// Redraw at most every 0.5 s while points stream in.
const plot = new Plot2D(context, createConsoleRenderer(), [sweep], { minTime: 0.5 });
plot.setLabels();

const step = (DEFAULT_SWEEP.vStop - DEFAULT_SWEEP.vStart) / (DEFAULT_SWEEP.points - 1);
let i = 0;

const timer = setInterval(() => {
  const v = DEFAULT_SWEEP.vStart + i * step;
  const current = 12 * Math.tanh(3 * v) + (Math.random() - 0.5) * 0.4;
  sweep.addPoint([v, current]);

  i++;
  if (i >= DEFAULT_SWEEP.points) {
    clearInterval(timer);
    // Make sure the last points are shown.
    const outcome = plot.update(true);
    if (outcome.status === 'failed') console.error(outcome.error);
  }
}, DEFAULT_SWEEP.tickMs);
