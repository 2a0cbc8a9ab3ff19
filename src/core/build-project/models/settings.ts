/**
 * Project Settings Models
 */

import { z } from "zod";

export const ProjectSettingsSchema = z
  .object({
    id: z.string(),
    name: z.string(),
  })
  .passthrough();

export type ProjectSettings = z.infer<typeof ProjectSettingsSchema>;

/**
 * Settings listing; the backend answers a single-project query with a list
 */
export const ProjectSettingsDocumentSchema = z
  .object({
    projects: z.array(ProjectSettingsSchema),
  })
  .passthrough();

export type ProjectSettingsDocument = z.infer<typeof ProjectSettingsDocumentSchema>;

/**
 * Settings body sent to the target: the source project's record without the
 * keys that identify or locate it in its own environment
 */
export type ProjectSettingsUpdate = Record<string, unknown>;

export interface CreateProjectRequest {
  name: string;
  org: string;
  workspace: string;
}

export const CreatedProjectSchema = z.object({ project_id: z.string() }).passthrough();

export type CreatedProject = z.infer<typeof CreatedProjectSchema>;
