/**
 * Plotting Type Definitions
 */

import type { Config, Data, Layout } from 'plotly.js';
import type { OutputBounds, SimulationResult } from '../simulator/types';

/** DOM element ID or element a figure is mounted into */
export type PlotRoot = string | HTMLElement;

/**
 * One Plotly figure
 */
export interface PlotlyFigure {
  data: Data[];
  layout: Partial<Layout>;
}

/**
 * The three figures of a closed-loop run
 */
export interface SimulationFigures {
  /** Measured value with setpoint and ambient */
  measurement: PlotlyFigure;
  /** Bounded control output with bound lines */
  control: PlotlyFigure;
  /** Tracking error with the controller integral */
  error: PlotlyFigure;
}

/**
 * The part of Plotly the chart manager mounts figures through
 */
export interface PlottingBackend {
  newPlot(
    root: PlotRoot,
    data: Data[],
    layout?: Partial<Layout>,
    config?: Partial<Config>
  ): Promise<unknown>;
}

/**
 * Anything that can display a finished run
 */
export interface SimulationRenderer {
  render(result: SimulationResult, bounds?: OutputBounds): Promise<void>;
}

export interface ChartManagerConfig {
  /** Default: 'measurement-chart' */
  measurementRoot?: PlotRoot;
  /** Default: 'control-chart' */
  controlRoot?: PlotRoot;
  /** Default: 'error-chart' */
  errorRoot?: PlotRoot;
  /** Enable responsive sizing (default: true) */
  responsive?: boolean;
  /** Unit shown on the measurement axis (default: '°C') */
  unit?: string;
}
