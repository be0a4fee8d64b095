export {
  convertLiteral,
  convertMapping,
  convertSchemaMapping,
  dumpExpression,
  isLiteralValue,
  isUnsupportedSentinel,
  mappingKey,
  mergeMapping,
  UNSUPPORTED_ATTRIBUTE_PREFIX,
  UNSUPPORTED_NAME_PREFIX,
  UNSUPPORTED_NODE_PREFIX,
} from './literal.js';
export type { LiteralContext, LiteralMapping, LiteralScalar, LiteralValue } from './literal.js';
export { extractBaseTemplate, findPlaceholderConstant, loadBaseTemplate } from './base-template.js';
export type { BaseMetadataTemplate } from './base-template.js';
export { extractModuleFile, extractModuleMetadata } from './module-metadata.js';
export type { FileOutcome, ModuleMetadataRecord, ToolSchema } from './module-metadata.js';
