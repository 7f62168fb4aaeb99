export { LocalCgiClient, buildEnvironment } from './localClient.js';
export type { CgiRequest, LocalClientDependencies, LocalClientOptions } from './localClient.js';
export { RemoteCgiClient, appendQuery } from './remoteClient.js';
export type { RemoteClientDependencies } from './remoteClient.js';
export {
  createCgiClient,
  createClientForTarget,
  createDefaultClientDependencies,
  detectScheme,
  resolveTarget
} from './dispatcher.js';
export type { CgiClient, ClientDependencies } from './dispatcher.js';
export { decodeResponse, parseHeaderLine, parseStatusLine } from './decoder.js';
export type { DecodedResponse } from './decoder.js';
export { ResponseHeaders } from './headers.js';
export type { HeaderRecord, HeaderValue } from './headers.js';
export {
  DEFAULT_MIME_TYPE,
  FORM_MIME_TYPE,
  decodeForm,
  encodeForm,
  encodePostData
} from './formEncoding.js';
export type { FormParams, FormScalar, PostData } from './formEncoding.js';
export { joinCommandLine, quoteArgument, splitCommandLine } from './commandLine.js';
export { SpawnProcessRunner } from './processRunner.js';
export type { ProcessResult, ProcessRunner, ProcessRunOptions } from './processRunner.js';
export { FetchHttpClient } from './fetchHttpClient.js';
export type { HttpClient, HttpRequestOptions, HttpResponse } from './httpClient.js';
export { CgiError, isCgiError } from './cgiErrors.js';
export type { CgiErrorClassification } from './cgiErrors.js';
export { loadConfig } from './loadConfig.js';
export type { CgiClientConfig, GatewayConfig, TargetEntry } from './loadConfig.js';
export { createGateway } from './gateway.js';
export type { Gateway, GatewayDependencies } from './gateway.js';
export { createLogger } from './logger.js';
export type { Logger, LogRecord } from './logger.js';
export { getMetricsSnapshot, resetMetrics } from './metrics.js';
export type { MetricsSnapshot } from './metrics.js';
export type { CgiCaller, CgiMethod, ClientKind, ResponseResult } from './types.js';
