export { mergeSidecar, buildProvenanceBlock, PROVENANCE_KEY, RESERVED_PREFIX } from './merger';
export type { MergeContext, MergeResult, MergeSummary } from './merger';
export { updateSidecarFile, loadSidecar } from './updater';
export type { SidecarUpdateOptions, SidecarUpdateResult } from './updater';
export { createBackup, backupPathFor, formatBackupTimestamp } from './backup';
export { parseSidecar, serializeSidecar, SidecarDocumentSchema, SidecarValidationError } from './schema';
