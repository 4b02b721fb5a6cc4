export * from './collections/index.js';
export { Experiment, type ExperimentParts, type FileList } from './Experiment.js';
export { ExperimentError, type ExperimentErrorCode } from './errors.js';
export { SLOT_KINDS, isSlotKind, isSubsetBy, type SlotKind, type SubsetBy } from './types.js';
export {
  buildLinkMatrix,
  emptyLinkMatrix,
  elementsBySample,
  linkCardinality,
  linkMatrixFromIndices,
  validateLinkMatrix,
  type LinkCardinality,
  type LinkMatrix,
  type LinkPair,
} from './links/LinkMatrix.js';
export { LinkRegistry, type LinkBounds, type LinkEntry } from './links/LinkRegistry.js';
export { allOwners, firstOwner, type AmbiguityPolicy, type FirstOwnerOptions } from './links/SampleIndexLookup.js';
export {
  consoleDiagnosticSink,
  type DiagnosticSink,
  type LinkDiagnostic,
  type LinkDiagnosticCode,
} from './links/diagnostics.js';
export { formatAddress, getElement, parseAddress, setElement, type ElementAddress } from './ElementAddressing.js';
export {
  isJoinExpression,
  joinTarget,
  parseJoin,
  resolveJoin,
  type JoinExpression,
  type JoinSide,
} from './JoinResolver.js';
export { linkAddress, linkSampleData, sampleDataLinks, type LinkSampleDataOptions } from './linkSampleData.js';
export { extractSamples, filterSpectra, selectLinkedElements, subsetSamples } from './SampleSubsetter.js';
export { resolveSelector, type SampleSelector } from './selectors.js';
export { spectraSampleIndex, SPECTRA_ADDRESS, type SampleIndexMode } from './spectraSampleIndex.js';
export { experimentFromFiles, RAW_FILES_ADDRESS } from './experimentFromFiles.js';
export { summarizeExperiment, type ExperimentSummary, type LinkSummary } from './summarizeExperiment.js';
export {
  decodeElement,
  decodeExperiment,
  encodeElement,
  encodeExperiment,
  experimentDocumentSchema,
  formatZodError,
  type ExperimentDocument,
} from './ExperimentCodec.js';
