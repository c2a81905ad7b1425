/**
 * Projects and jobs: the parents artifact managers hang off.
 *
 * Only what addressing needs is modelled here. Attributes returned by the
 * server are kept as-is on the object.
 */

import type { GitlabClient } from '../client';
import { Attributes, RESTObject, RetrieveManager } from '../rest/base';
import { ProjectArtifactManager, ProjectJobArtifactManager } from './artifacts';

export class ProjectJob extends RESTObject {
  public readonly artifacts: ProjectJobArtifactManager;

  constructor(client: GitlabClient, attributes: Attributes) {
    super(client, attributes);
    this.artifacts = new ProjectJobArtifactManager(client, this);
  }
}

export class ProjectJobManager extends RetrieveManager<ProjectJob> {
  protected readonly pathTemplate = '/projects/{project_id}/jobs';
  protected readonly fromParentAttrs = { project_id: 'id' };

  protected createObject(attributes: Attributes): ProjectJob {
    return new ProjectJob(this.client, attributes);
  }
}

export class Project extends RESTObject {
  public readonly artifacts: ProjectArtifactManager;
  public readonly jobs: ProjectJobManager;

  constructor(client: GitlabClient, attributes: Attributes) {
    super(client, attributes);
    this.artifacts = new ProjectArtifactManager(client, this);
    this.jobs = new ProjectJobManager(client, this);
  }
}

export class ProjectManager extends RetrieveManager<Project> {
  protected readonly pathTemplate = '/projects';

  protected createObject(attributes: Attributes): Project {
    return new Project(this.client, attributes);
  }
}
