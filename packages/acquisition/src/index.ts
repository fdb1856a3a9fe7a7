/**
 * @tubemux/acquisition
 *
 * Stream acquisition layer.
 *
 * Responsibilities:
 * - Resolve a locator into adaptive stream descriptors
 * - Offer and resolve a resolution choice
 * - Download the chosen pair to temporary files
 */

// Catalog adapter
export { YoutubeCatalog, toDescriptor } from './catalog.js';

// Resolution selection
export {
  availableResolutions,
  selectResolution,
  resolveDescriptors,
  nominalResolution,
  resolutionHeight,
  SELECTABLE_CONTAINER,
  type ChoiceResult,
} from './selector.js';

// Retrieval
export {
  RetrievalPipeline,
  type RetrievalTargets,
  type RetrievalListener,
  type RetrievalOptions,
} from './retrieval.js';
