export * from './types';
export { EntityExtractionCapability } from './extractor';
export { buildRawExtraction, findJsonObject, stripCodeFence, ResponseParseError } from './parser';
