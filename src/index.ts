/**
 * Typed bindings for the GitLab job artifacts API.
 *
 * Download artifact archives and single artifact files by ref and job name or
 * by job id, as a Buffer, as chunks pushed to a callback, or as an async
 * iterator of chunks.
 */

export { GitlabClient } from './client';
export type { ClientDependencies, ExtraOptions, FetchFn, HttpRequestOptions, HttpVerb, QueryValue } from './client';
export * from './config';
export * from './domain/errors';
export { DEFAULT_CHUNK_SIZE, ResponseHandle } from './http/response';
export { responseContent } from './http/content';
export type { ChunkHandler, ResponseContent, ResponseContentOptions } from './http/content';
export * from './logger';
export * from './objects/artifacts';
export * from './objects/projects';
export { RESTManager, RESTObject, RetrieveManager } from './rest/base';
export type { Attributes, GetOptions, ResourceId } from './rest/base';
