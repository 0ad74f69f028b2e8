export * from './errors/index.js';
export * from './logger.js';
export * from './env-loader.js';

export * from './template/types.js';
export { parseTemplate, type ParseTemplateOptions } from './template/parser.js';
export { serializeTemplate, formatElement, formatStartTag, escapeAttribute, escapeText } from './template/serializer.js';

export * from './mapping/types.js';
export * from './mapping/path-expression.js';
export {
  DEFAULT_KEY_MAP_FILE,
  formatLocation,
  formatTarget,
  getDefaultKeyMapPath,
  loadKeyPathMap,
  parseKeyPathMap,
  parseTarget,
} from './mapping/key-path-map.js';
export { formatValue, describeValue, type FormattedValue } from './mapping/values.js';

export * from './config/config-document.js';
export * from './expansion/dates.js';
export * from './expansion/directives.js';
export * from './validation/config-validator.js';
export * from './planning/patch-planner.js';
export * from './upsert/upsert-engine.js';
export { verifyPlan } from './upsert/verify.js';
export * from './diff/diff-reporter.js';
export * from './orchestration/patch-pipeline.js';

export * from './io/encoding.js';
export * from './io/files.js';
export * from './io/commit.js';
