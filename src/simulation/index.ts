/**
 * Sample sources and the pump that feeds them to the detector
 */

export { SimulatedStream } from './stream';
export { StreamPump } from './pump';
export type { SampleSink, StreamPumpOptions, StreamPumpStatus } from './pump';
export { DEFAULT_STREAM_OPTIONS } from './types';
export type { DataSource, SimulatedStreamOptions, SimulatedStreamStats } from './types';
