/**
 * Resource addressing primitives.
 *
 * A RESTObject is an attribute bag addressed by one identifying attribute.
 * A RESTManager owns a path template such as
 * `/projects/{project_id}/jobs/{job_id}/artifacts` and fills its
 * placeholders from the parent object's attributes.
 */

import type { ExtraOptions, GitlabClient } from '../client';
import { GitlabAttributeError, GitlabGetError, withHttpError } from '../domain/errors';

export type Attributes = Record<string, unknown>;

/** Identifiers accepted in paths: numeric ids or full paths such as `group/project`. */
export type ResourceId = string | number;

export class RESTObject {
  /** Name of the attribute that identifies this object. */
  protected readonly idAttr: string = 'id';

  constructor(
    protected readonly client: GitlabClient,
    protected readonly attributes: Attributes,
  ) {}

  getId(): unknown {
    return this.attributes[this.idAttr];
  }

  getAttribute(name: string): unknown {
    return this.attributes[name];
  }

  /** Shallow copy of the attributes. */
  toJSON(): Attributes {
    return { ...this.attributes };
  }
}

function isResourceId(value: unknown): value is ResourceId {
  return typeof value === 'string' || typeof value === 'number';
}

/** Encode an identifier as a single path segment. */
export function encodePathSegment(value: ResourceId): string {
  return encodeURIComponent(String(value));
}

/** Encode a slash-separated path, keeping the separators. */
export function encodeFilePath(path: string): string {
  return path.split('/').map((segment) => encodeURIComponent(segment)).join('/');
}

export abstract class RESTManager {
  protected abstract readonly pathTemplate: string;
  /** Placeholder name → parent attribute name. */
  protected readonly fromParentAttrs: Record<string, string> = {};

  constructor(
    protected readonly client: GitlabClient,
    protected readonly parent?: RESTObject,
  ) {}

  /** The template with every placeholder filled from the parent. */
  get path(): string {
    return this.computePath(this.pathTemplate);
  }

  /** Parent attributes that objects created by this manager inherit. */
  protected get parentAttrs(): Attributes {
    const attrs: Attributes = {};
    for (const [placeholder, attr] of Object.entries(this.fromParentAttrs)) {
      attrs[placeholder] = this.parent?.getAttribute(attr);
    }
    return attrs;
  }

  protected computePath(template: string): string {
    return template.replace(/\{(\w+)\}/g, (_match, placeholder: string) => {
      const attr = this.fromParentAttrs[placeholder];
      if (attr === undefined) {
        throw new GitlabAttributeError(`No parent attribute mapped to {${placeholder}} in ${template}`);
      }
      const value = this.parent?.getAttribute(attr);
      if (!isResourceId(value)) {
        throw new GitlabAttributeError(
          `Cannot build ${template}: parent attribute "${attr}" is ${value === undefined ? 'missing' : 'not an identifier'}`,
        );
      }
      return encodePathSegment(value);
    });
  }
}

export interface GetOptions {
  /** Build the object from the id alone, without a request. */
  lazy?: boolean;
  extra?: ExtraOptions;
}

/** A manager whose objects can be fetched by id. */
export abstract class RetrieveManager<T extends RESTObject> extends RESTManager {
  /** Attribute the id is stored under when building a lazy object. */
  protected readonly idAttr: string = 'id';

  protected abstract createObject(attributes: Attributes): T;

  /**
   * @throws GitlabGetError when the server rejects the request
   */
  async get(id: ResourceId, options: GetOptions = {}): Promise<T> {
    if (options.lazy) {
      return this.createObject({ ...this.parentAttrs, [this.idAttr]: id });
    }
    const attributes = await withHttpError(GitlabGetError, () =>
      this.client.httpGetJson(`${this.path}/${encodePathSegment(id)}`, { extra: options.extra }),
    );
    return this.createObject({ ...this.parentAttrs, ...attributes });
  }
}
