// Schema exports
export * from './schema/reference-table.schema.js';
export * from './schema/callsign.schema.js';
export * from './schema/dxcc-config.schema.js';

// 枚举
export * from './types.js';
