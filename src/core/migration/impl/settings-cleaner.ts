/**
 * Project settings carried from source to target.
 */

import type {
  ProjectSettings,
  ProjectSettingsDocument,
  ProjectSettingsUpdate,
} from "../../build-project/models/settings.js";
import { MissingEntityError } from "../../errors.js";

/**
 * Keys that identify or locate a project in its own environment
 */
export const ENVIRONMENT_SETTINGS_KEYS = ["id", "project_root", "data_root", "workspace", "name"] as const;

export function findProject(projectId: string, settings: ProjectSettingsDocument): ProjectSettings {
  const project = settings.projects.find((candidate) => candidate.id === projectId);
  if (!project) {
    throw new MissingEntityError("Project", projectId);
  }
  return project;
}

export function buildSettingsUpdate(
  projectId: string,
  settings: ProjectSettingsDocument
): ProjectSettingsUpdate {
  const update: ProjectSettingsUpdate = structuredClone(findProject(projectId, settings));
  for (const key of ENVIRONMENT_SETTINGS_KEYS) {
    delete update[key];
  }
  return update;
}
