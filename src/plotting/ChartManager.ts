/**
 * Chart Manager
 *
 * Builds Plotly figures for a finished closed-loop run:
 * - Measured value against setpoint and ambient
 * - Bounded control output with the actuator bounds
 * - Tracking error with the controller integral on a second axis
 *
 * Transition sequences (control, error) are plotted against time[0..n-1],
 * state sequences against the full time axis. Figures are mounted through an
 * injected backend so the simulation core never imports Plotly.
 */

import type { Config, Data, Layout, Shape } from 'plotly.js';
import type { OutputBounds, SimulationResult } from '../simulator/types';
import type {
  ChartManagerConfig,
  PlotRoot,
  PlotlyFigure,
  PlottingBackend,
  SimulationFigures,
  SimulationRenderer,
} from './types';

const COLORS = {
  measured: '#D1495B',
  setpoint: '#2E4057',
  ambient: '#66A182',
  control: '#EDAE49',
  bound: '#888888',
  error: '#00798C',
  integral: '#8D6A9F',
} as const;

const MARGIN = { t: 50, r: 80, b: 50, l: 60 };

/** Horizontal dashed line across the plot at a control bound */
function boundLine(level: number): Partial<Shape> {
  return {
    type: 'line',
    xref: 'paper',
    x0: 0,
    x1: 1,
    yref: 'y',
    y0: level,
    y1: level,
    line: { color: COLORS.bound, width: 1, dash: 'dash' },
  };
}

export class ChartManager implements SimulationRenderer {
  private readonly backend: PlottingBackend;

  // Chart containers
  private readonly measurementRoot: PlotRoot;
  private readonly controlRoot: PlotRoot;
  private readonly errorRoot: PlotRoot;

  private readonly responsive: boolean;
  private readonly unit: string;

  /**
   * Create a ChartManager instance
   *
   * @param backend - Plotly, or anything with its newPlot signature (see loadPlotlyBackend)
   * @param config - Chart containers and display options
   */
  constructor(backend: PlottingBackend, config: ChartManagerConfig = {}) {
    this.backend = backend;
    this.measurementRoot = config.measurementRoot ?? 'measurement-chart';
    this.controlRoot = config.controlRoot ?? 'control-chart';
    this.errorRoot = config.errorRoot ?? 'error-chart';
    this.responsive = config.responsive ?? true;
    this.unit = config.unit ?? '°C';
  }

  /**
   * Build all three figures without mounting them
   *
   * @param bounds - Drawn as dashed lines on the control figure when given
   */
  buildFigures(result: SimulationResult, bounds?: OutputBounds): SimulationFigures {
    return {
      measurement: this.buildMeasurementFigure(result),
      control: this.buildControlFigure(result, bounds),
      error: this.buildErrorFigure(result),
    };
  }

  /**
   * Mount all three figures
   */
  async render(result: SimulationResult, bounds?: OutputBounds): Promise<void> {
    const figures = this.buildFigures(result, bounds);
    const config: Partial<Config> = {
      responsive: this.responsive,
      displayModeBar: false,
    };

    await Promise.all([
      this.backend.newPlot(this.measurementRoot, figures.measurement.data, figures.measurement.layout, config),
      this.backend.newPlot(this.controlRoot, figures.control.data, figures.control.layout, config),
      this.backend.newPlot(this.errorRoot, figures.error.data, figures.error.layout, config),
    ]);
  }

  private buildMeasurementFigure(result: SimulationResult): PlotlyFigure {
    const time = Array.from(result.time);

    const data: Data[] = [
      {
        x: time,
        y: Array.from(result.measured),
        name: 'Measured',
        line: { color: COLORS.measured, width: 3 },
        mode: 'lines',
      },
      {
        x: time,
        y: Array.from(result.setpoint),
        name: 'Setpoint',
        line: { color: COLORS.setpoint, width: 2, dash: 'dash' },
        mode: 'lines',
      },
      {
        x: time,
        y: Array.from(result.ambient),
        name: 'Ambient',
        line: { color: COLORS.ambient, width: 2, dash: 'dot' },
        mode: 'lines',
      },
    ];

    const layout: Partial<Layout> = {
      title: { text: 'Measured Value' },
      xaxis: { title: { text: 'Time (s)' }, gridcolor: '#e0e0e0' },
      yaxis: { title: { text: `Value (${this.unit})` }, gridcolor: '#e0e0e0' },
      showlegend: true,
      margin: MARGIN,
      hovermode: 'closest',
    };

    return { data, layout };
  }

  private buildControlFigure(result: SimulationResult, bounds?: OutputBounds): PlotlyFigure {
    const data: Data[] = [
      {
        x: Array.from(result.time.subarray(0, result.stepsCount)),
        y: Array.from(result.control),
        name: 'Control',
        line: { color: COLORS.control, width: 2, shape: 'hv' },
        mode: 'lines',
      },
    ];

    const shapes = bounds ? [boundLine(bounds.uMin), boundLine(bounds.uMax)] : [];

    const layout: Partial<Layout> = {
      title: { text: 'Control Output' },
      xaxis: { title: { text: 'Time (s)' }, gridcolor: '#e0e0e0' },
      yaxis: { title: { text: 'Control (%)' }, gridcolor: '#e0e0e0' },
      shapes,
      showlegend: true,
      margin: MARGIN,
      hovermode: 'closest',
    };

    return { data, layout };
  }

  private buildErrorFigure(result: SimulationResult): PlotlyFigure {
    const data: Data[] = [
      {
        x: Array.from(result.time.subarray(0, result.stepsCount)),
        y: Array.from(result.error),
        name: 'Error',
        line: { color: COLORS.error, width: 2 },
        yaxis: 'y',
        mode: 'lines',
      },
      // Integral on the secondary axis
      {
        x: Array.from(result.time),
        y: Array.from(result.integral),
        name: 'Integral',
        line: { color: COLORS.integral, width: 2, dash: 'dot' },
        yaxis: 'y2',
        mode: 'lines',
      },
    ];

    const layout: Partial<Layout> = {
      title: { text: 'Tracking Error & Integral' },
      xaxis: { title: { text: 'Time (s)' }, gridcolor: '#e0e0e0' },
      yaxis: {
        title: { text: `Error (${this.unit})` },
        side: 'left',
        gridcolor: '#e0e0e0',
        zeroline: true,
      },
      yaxis2: {
        title: { text: 'Integral' },
        side: 'right',
        overlaying: 'y',
        showgrid: false,
      },
      showlegend: true,
      margin: MARGIN,
      hovermode: 'closest',
    };

    return { data, layout };
  }
}

/**
 * Load Plotly as a plotting backend
 *
 * Plotly needs a DOM; call this from a browser bundle only.
 */
export async function loadPlotlyBackend(): Promise<PlottingBackend> {
  const Plotly = await import('plotly.js-dist-min');
  return {
    newPlot: (root, data, layout, config) => Plotly.newPlot(root, data, layout, config),
  };
}
