import { z } from 'zod';

/**
 * Fields every artifact carries. Unknown fields pass through untouched, so custom fields
 * (`c_*`) and anything the service adds survive a round trip.
 */
const artifactFields = {
  ObjectID: z.number().int().optional(),
  ObjectUUID: z.string().optional(),
  _ref: z.string().optional(),
  _refObjectName: z.string().optional(),
  _type: z.string().optional(),
  CreationDate: z.string().optional(),
  LastUpdateDate: z.string().optional(),
};

/** Object reference as the service embeds it: `{ _ref, _refObjectName }`. */
export const referenceSchema = z
  .object({
    _ref: z.string(),
    _refObjectName: z.string().optional(),
  })
  .passthrough()
  .nullable();

const workItemFields = {
  ...artifactFields,
  FormattedID: z.string().optional(),
  Name: z.string().optional(),
  Description: z.string().nullable().optional(),
  Notes: z.string().nullable().optional(),
  Owner: referenceSchema.optional(),
  Project: referenceSchema.optional(),
  Workspace: referenceSchema.optional(),
};

export const defectSchema = z
  .object({
    ...workItemFields,
    State: z.string().nullable().optional(),
    Severity: z.string().nullable().optional(),
    Priority: z.string().nullable().optional(),
    Requirement: referenceSchema.optional(),
  })
  .passthrough();

export const taskSchema = z
  .object({
    ...workItemFields,
    State: z.string().nullable().optional(),
    Estimate: z.number().nullable().optional(),
    ToDo: z.number().nullable().optional(),
    Actuals: z.number().nullable().optional(),
    WorkProduct: referenceSchema.optional(),
  })
  .passthrough();

export const hierarchicalRequirementSchema = z
  .object({
    ...workItemFields,
    ScheduleState: z.string().nullable().optional(),
    PlanEstimate: z.number().nullable().optional(),
    Parent: referenceSchema.optional(),
    Iteration: referenceSchema.optional(),
    Release: referenceSchema.optional(),
  })
  .passthrough();

export const changesetSchema = z
  .object({
    ...artifactFields,
    Revision: z.string().optional(),
    CommitTimestamp: z.string().nullable().optional(),
    Message: z.string().nullable().optional(),
    Uri: z.string().nullable().optional(),
    SCMRepository: referenceSchema.optional(),
    Author: referenceSchema.optional(),
  })
  .passthrough();

export const buildDefinitionSchema = z
  .object({
    ...artifactFields,
    Name: z.string().optional(),
    Description: z.string().nullable().optional(),
    Uri: z.string().nullable().optional(),
    Project: referenceSchema.optional(),
    LastStatus: z.string().nullable().optional(),
  })
  .passthrough();

export type Defect = z.output<typeof defectSchema>;
export type Task = z.output<typeof taskSchema>;
export type HierarchicalRequirement = z.output<typeof hierarchicalRequirementSchema>;
export type Changeset = z.output<typeof changesetSchema>;
export type BuildDefinition = z.output<typeof buildDefinitionSchema>;
