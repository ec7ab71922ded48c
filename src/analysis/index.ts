export {
  summarizeResponse,
  proportionalOffset,
  type ResponseMetrics,
  type ResponseMetricsOptions,
} from './responseMetrics';
