/**
 * @clipfilter/filters
 *
 * Single-flight filter execution over clipboard and HTTP collaborators
 */

export { FilterExecutor } from './filter-executor.js';

export type {
  FilterContext,
  FilterExecutorOptions,
  FilterRunOutcome,
  FilterRunStage,
  FilterRunState
} from './filter-executor.js';

export { SingleFlightGate, processFilterGate } from './single-flight.js';

export { buildSystemPrompt, buildUserPrompt } from './system-prompt.js';

export { FetchHttpTransport } from './fetch-transport.js';

export type { FetchHttpTransportOptions } from './fetch-transport.js';

export { PngImageCodec } from './image-codec.js';
