export { loadConfig, loadConfigFile } from './config/index';
export type { Config, Env, LlmProvider } from './config/index';

export * from './modules/capabilities/index';
export * from './modules/lookup/index';
export * from './modules/llm/index';
export * from './modules/extraction/index';
export * from './modules/note/index';
export * from './modules/validation/index';
export * from './modules/trajectory/index';
export * from './pipeline/index';

export { HttpClient } from './utils/http';
export type { HttpClientOptions } from './utils/http';
export { HttpRequestError, RunDeadlineError, classifyRequestError } from './utils/errors';
export type { HttpErrorKind } from './utils/errors';
export { createLogger } from './utils/logger';
export type { Logger, LogLevel } from './utils/logger';
export { loadPrompt, loadTemplate, renderPrompt, renderTemplate, templatePlaceholders } from './templates/loader';
