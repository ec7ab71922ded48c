/**
 * Plotting Module
 *
 * Exports the chart manager and its types.
 */

export { ChartManager, loadPlotlyBackend } from './ChartManager';
export type {
  PlotRoot,
  PlotlyFigure,
  SimulationFigures,
  PlottingBackend,
  SimulationRenderer,
  ChartManagerConfig,
} from './types';
