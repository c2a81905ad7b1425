/**
 * Job artifacts API.
 *
 *   GET    /projects/:id/jobs/artifacts/:ref_name/download?job=:name
 *   GET    /projects/:id/jobs/artifacts/:ref_name/raw/*artifact_path?job=:name
 *   DELETE /projects/:id/artifacts
 *   GET    /projects/:id/jobs/:job_id/artifacts
 *   GET    /projects/:id/jobs/:job_id/artifacts/*artifact_path
 *
 * Every download accepts the same transfer options and resolves to a Buffer
 * (default), undefined (streamed) or an async iterator of chunks (iterator).
 */

import type { ExtraOptions } from '../client';
import { GitlabDeleteError, GitlabGetError, withHttpError } from '../domain/errors';
import { ChunkHandler, ResponseContent, responseContent } from '../http/content';
import { assertChunkSize, DEFAULT_CHUNK_SIZE } from '../http/response';
import { warnDeprecated } from '../utils/deprecation';
import { RESTManager, RESTObject, encodeFilePath, encodePathSegment } from '../rest/base';

interface TransferOptionsBase {
  /** Bytes per chunk in streamed and iterator mode (default 1024). */
  chunkSize?: number;
  /** Extra query parameters; `sudo` becomes the Sudo header. */
  extra?: ExtraOptions;
}

/** Read the whole body into one Buffer. */
export interface BufferedTransferOptions extends TransferOptionsBase {
  streamed?: false;
  iterator?: false;
  action?: undefined;
}

/** Push each chunk to `action`; resolves once the body is exhausted. */
export interface StreamedTransferOptions extends TransferOptionsBase {
  streamed: true;
  iterator?: false;
  action?: ChunkHandler;
}

/** Hand back the lazy chunk iterator. Takes precedence over `streamed`. */
export interface IteratorTransferOptions extends TransferOptionsBase {
  iterator: true;
  streamed?: boolean;
  action?: ChunkHandler;
}

export type TransferOptions = BufferedTransferOptions | StreamedTransferOptions | IteratorTransferOptions;

/** Options for downloads addressed by ref name, which may use a job token. */
export type RefTransferOptions<T extends TransferOptions = TransferOptions> = T & {
  /** CI job token, for multi-project pipelines. Sent as the job_token query parameter. */
  jobToken?: string;
};

export type ChunkIterator = AsyncGenerator<Buffer, void, undefined>;

/** Placeholder object for artifacts addressed by ref name. */
export class ProjectArtifact extends RESTObject {
  protected readonly idAttr = 'ref_name';
}

/** Placeholder object for a file inside a job's artifacts. */
export class ProjectJobArtifact extends RESTObject {
  protected readonly idAttr = 'artifact_path';
}

abstract class ArtifactTransferManager extends RESTManager {
  /** GET `path` and materialize the body as `options` asks. */
  protected async transfer(
    path: string,
    query: Record<string, string | undefined>,
    options: TransferOptions,
  ): Promise<ResponseContent> {
    const chunked = options.iterator === true || options.streamed === true;
    if (chunked) {
      assertChunkSize(options.chunkSize ?? DEFAULT_CHUNK_SIZE);
    }
    return withHttpError(GitlabGetError, async () => {
      const response = await this.client.httpGet(path, {
        query,
        extra: options.extra,
        streamed: chunked,
      });
      return responseContent(response, options);
    });
  }
}

/** Artifacts of the latest successful pipeline for a ref, by job name. */
export class ProjectArtifactManager extends ArtifactTransferManager {
  protected readonly pathTemplate = '/projects/{project_id}/jobs/artifacts';
  protected readonly fromParentAttrs = { project_id: 'id' };

  /**
   * Get the job artifacts archive from a specific tag or branch.
   *
   * @param refName - Branch or tag name. HEAD and SHA references are not supported.
   * @param job - Name of the job that produced the artifacts.
   * @throws GitlabAuthenticationError if the token is rejected
   * @throws GitlabGetError if the artifacts could not be retrieved
   */
  download(refName: string, job: string, options: RefTransferOptions<IteratorTransferOptions>): Promise<ChunkIterator>;
  download(refName: string, job: string, options: RefTransferOptions<StreamedTransferOptions>): Promise<undefined>;
  download(refName: string, job: string, options?: RefTransferOptions<BufferedTransferOptions>): Promise<Buffer>;
  download(refName: string, job: string, options?: RefTransferOptions): Promise<ResponseContent>;
  async download(refName: string, job: string, options: RefTransferOptions = {}): Promise<ResponseContent> {
    const path = `${this.path}/${encodePathSegment(refName)}/download`;
    return this.transfer(path, { job, job_token: options.jobToken }, options);
  }

  /**
   * Download a single file from the artifacts archive of a tag or branch.
   *
   * @param artifactPath - Path of the file inside the archive. Not checked locally.
   * @throws GitlabAuthenticationError if the token is rejected
   * @throws GitlabGetError if the file could not be retrieved
   */
  raw(refName: string, artifactPath: string, job: string, options: RefTransferOptions<IteratorTransferOptions>): Promise<ChunkIterator>;
  raw(refName: string, artifactPath: string, job: string, options: RefTransferOptions<StreamedTransferOptions>): Promise<undefined>;
  raw(refName: string, artifactPath: string, job: string, options?: RefTransferOptions<BufferedTransferOptions>): Promise<Buffer>;
  raw(refName: string, artifactPath: string, job: string, options?: RefTransferOptions): Promise<ResponseContent>;
  async raw(refName: string, artifactPath: string, job: string, options: RefTransferOptions = {}): Promise<ResponseContent> {
    const path = `${this.path}/${encodePathSegment(refName)}/raw/${encodeFilePath(artifactPath)}`;
    return this.transfer(path, { job, job_token: options.jobToken }, options);
  }

  /**
   * Delete every job artifact of the project.
   *
   * @throws GitlabAuthenticationError if the token is rejected
   * @throws GitlabDeleteError if the server refuses the deletion
   */
  async delete(extra?: ExtraOptions): Promise<void> {
    const path = this.computePath('/projects/{project_id}/artifacts');
    await withHttpError(GitlabDeleteError, () => this.client.httpDelete(path, { extra }));
  }

  /** @deprecated Use download() instead. */
  async call(refName: string, job: string, options?: RefTransferOptions): Promise<ResponseContent> {
    warnDeprecated(
      'ProjectArtifactManager.call() is deprecated and will be removed in a future version. ' +
      'Use project.artifacts.download() instead.',
    );
    return this.download(refName, job, options);
  }
}

/** Artifacts of one job, addressed by job id. */
export class ProjectJobArtifactManager extends ArtifactTransferManager {
  protected readonly pathTemplate = '/projects/{project_id}/jobs/{job_id}/artifacts';
  protected readonly fromParentAttrs = { project_id: 'project_id', job_id: 'id' };

  /**
   * Get the job's artifacts archive.
   *
   * @throws GitlabAuthenticationError if the token is rejected
   * @throws GitlabGetError if the artifacts could not be retrieved
   */
  download(options: IteratorTransferOptions): Promise<ChunkIterator>;
  download(options: StreamedTransferOptions): Promise<undefined>;
  download(options?: BufferedTransferOptions): Promise<Buffer>;
  download(options?: TransferOptions): Promise<ResponseContent>;
  async download(options: TransferOptions = {}): Promise<ResponseContent> {
    return this.transfer(this.path, {}, options);
  }

  /**
   * Get a single file from the job's artifacts archive.
   *
   * @param path - Path of the file inside the archive.
   * @throws GitlabGetError if the file could not be retrieved
   */
  raw(path: string, options: IteratorTransferOptions): Promise<ChunkIterator>;
  raw(path: string, options: StreamedTransferOptions): Promise<undefined>;
  raw(path: string, options?: BufferedTransferOptions): Promise<Buffer>;
  raw(path: string, options?: TransferOptions): Promise<ResponseContent>;
  async raw(path: string, options: TransferOptions = {}): Promise<ResponseContent> {
    return this.transfer(`${this.path}/${encodeFilePath(path)}`, {}, options);
  }

  /** @deprecated Use download() instead. */
  async call(options?: TransferOptions): Promise<ResponseContent> {
    warnDeprecated(
      'ProjectJobArtifactManager.call() is deprecated and will be removed in a future version. ' +
      'Use job.artifacts.download() instead.',
    );
    return this.download(options);
  }
}
