/**
 * Target project preparation: create the project when none is configured,
 * then copy the source settings onto it.
 */

import type { IBuildProjectGateway } from "../../build-project/interfaces/IBuildProjectGateway.js";
import type { ProjectSettingsDocument } from "../../build-project/models/settings.js";
import { TargetPreparationError } from "../../errors.js";
import { createLogger } from "../../../utils/logger.js";
import { buildSettingsUpdate, findProject } from "./settings-cleaner.js";

const logger = createLogger("target-project");

export type TargetProjectGateway = Pick<IBuildProjectGateway, "createProject" | "updateSettings">;

export interface PrepareTargetOptions {
  sourceProjectId: string;
  settings: ProjectSettingsDocument;
  target: {
    project_id?: string;
    org: string;
    workspace: string;
  };
  /** Runs right after a project is created, before its settings are applied */
  onCreated?: (projectId: string) => Promise<void>;
}

export interface PreparedTarget {
  projectId: string;
  created: boolean;
}

/**
 * @throws {TargetPreparationError} carrying the project id once the target
 * exists; `partial` is set when the target was created or its settings were
 * being applied
 */
export async function prepareTargetProject(
  gateway: TargetProjectGateway,
  options: PrepareTargetOptions
): Promise<PreparedTarget> {
  const { sourceProjectId, settings, target } = options;
  const source = findProject(sourceProjectId, settings);
  const update = buildSettingsUpdate(sourceProjectId, settings);

  let projectId = target.project_id;
  let created = false;
  if (!projectId) {
    try {
      const result = await gateway.createProject({
        name: source.name,
        org: target.org,
        workspace: target.workspace,
      });
      projectId = result.project_id;
    } catch (error) {
      throw new TargetPreparationError(
        "Could not create the target project",
        { created: false, partial: false },
        error
      );
    }
    created = true;
    logger.info({ projectId, name: source.name }, "Created target project");

    try {
      await options.onCreated?.(projectId);
    } catch (error) {
      logger.error({ err: error, projectId }, "Created target project could not be recorded");
      throw new TargetPreparationError(
        `Target project ${projectId} was created but could not be recorded`,
        { projectId, created, partial: true },
        error
      );
    }
  }

  try {
    await gateway.updateSettings(projectId, update);
  } catch (error) {
    throw new TargetPreparationError(
      `Could not apply source settings to target project ${projectId}`,
      { projectId, created, partial: true },
      error
    );
  }
  logger.debug({ projectId }, "Applied source settings to target");

  return { projectId, created };
}
