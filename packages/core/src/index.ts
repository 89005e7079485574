// 参考数据查询层
export * from './dxcc/time-window.js';
export * from './dxcc/IReferenceQuery.js';
export * from './dxcc/ScanReferenceQuery.js';
export * from './dxcc/IndexedReferenceQuery.js';
export * from './dxcc/createReferenceQuery.js';
export * from './dxcc/reference-table-validator.js';
export * from './dxcc/ReferenceDataError.js';
export * from './dxcc/ReferenceDataStore.js';
export * from './dxcc/dxcc-config.js';
export * from './dxcc/logger.js';

// 呼号分析
export * from './callsign/CallsignError.js';
export * from './callsign/prefix-resolver.js';
export * from './callsign/callsign-segmenter.js';
export * from './callsign/callsign-analyzer.js';
export * from './callsign/whitelist-checker.js';
