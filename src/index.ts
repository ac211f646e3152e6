export * from './types/elan';
export * from './errors';
export * from './constants/annotation-types';
export { generateId, annotationId, timeSlotId, idNumber, maxIdNumber } from './utils/id-generator';
export { mimeTypeFor } from './utils/media-formats';
export { formatTime } from './utils/time';

export * from './services/elan/annotation';
export * from './services/elan/annotation-value';
export * from './services/elan/tier';
export * from './services/elan/time-order';
export * from './services/elan/eaf-index';
export * from './services/elan/eaf-derive';
export * from './services/elan/eaf-remap';
export * from './services/elan/eaf-extract';
export * from './services/elan/eaf-merger';
export * from './services/elan/eaf-validate';
export * from './services/elan/eaf-document';
export * from './services/elan/eaf-editor';
export * from './services/elan/eaf-builder';
export * from './services/elan/eaf-query';
export * from './services/elan/media';
export * from './services/elan/eaf-parser';
export * from './services/elan/eaf-writer';
export * from './services/elan/eaf-importer';

export * from './services/export/json-exporter';
export * from './services/export/csv-exporter';
export * from './services/file-system/file-writer';

export * from './stores/settings-store';
export * from './stores/document-store';
