/**
 * Resource entrypoint: typed wrappers for the artifact collections the service exposes.
 * @module
 */
import type { ArtifactClient } from '../core/client.js';
import {
  buildDefinitionSchema,
  changesetSchema,
  defectSchema,
  hierarchicalRequirementSchema,
  taskSchema,
} from './models.js';
import { ArtifactResource } from './resource.js';

export { ArtifactResource, type ResourceDefinition } from './resource.js';
export {
  type BuildDefinition,
  buildDefinitionSchema,
  type Changeset,
  changesetSchema,
  type Defect,
  defectSchema,
  type HierarchicalRequirement,
  hierarchicalRequirementSchema,
  referenceSchema,
  type Task,
  taskSchema,
} from './models.js';

/** Defects: `{base}/defect`. */
export function defects(client: ArtifactClient): ArtifactResource<typeof defectSchema> {
  return new ArtifactResource(client, { type: 'defect', name: 'Defect', schema: defectSchema });
}

/** Tasks: `{base}/task`. */
export function tasks(client: ArtifactClient): ArtifactResource<typeof taskSchema> {
  return new ArtifactResource(client, { type: 'task', name: 'Task', schema: taskSchema });
}

/** User stories: `{base}/hierarchicalrequirement`. */
export function hierarchicalRequirements(
  client: ArtifactClient,
): ArtifactResource<typeof hierarchicalRequirementSchema> {
  return new ArtifactResource(client, {
    type: 'hierarchicalrequirement',
    name: 'HierarchicalRequirement',
    schema: hierarchicalRequirementSchema,
  });
}

/** Source control changesets: `{base}/changeset`. */
export function changesets(client: ArtifactClient): ArtifactResource<typeof changesetSchema> {
  return new ArtifactResource(client, { type: 'changeset', name: 'Changeset', schema: changesetSchema });
}

/** Build definitions: `{base}/builddefinition`. */
export function buildDefinitions(client: ArtifactClient): ArtifactResource<typeof buildDefinitionSchema> {
  return new ArtifactResource(client, {
    type: 'builddefinition',
    name: 'BuildDefinition',
    schema: buildDefinitionSchema,
  });
}
