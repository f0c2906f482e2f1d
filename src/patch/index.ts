export * from './types.js';
export { applyEdits, describeEdit, type EditContext } from './apply-edits.js';
export { PatchEditSchema, PatchProposalSchema } from './schema.js';
export { PatchApplier, type PatchApplierOptions } from './patch-applier.js';
