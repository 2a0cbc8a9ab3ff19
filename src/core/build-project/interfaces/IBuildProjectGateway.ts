/**
 * Build Project Gateway Interface
 *
 * The request/response surface of a build-project environment. The
 * reconciliation core depends on narrow `Pick`s of it; transport, auth and
 * retry behaviour belong to implementations.
 */

import type { Identifier, SchemaDocument, SchemaPayload } from "../models/schema.js";
import type { CreatedUdf, Udf, UdfCatalog } from "../models/udf.js";
import type {
  PersistedValidation,
  ValidationDocument,
  ValidationPayload,
} from "../models/validation.js";
import type {
  CreateProjectRequest,
  CreatedProject,
  ProjectSettingsDocument,
  ProjectSettingsUpdate,
} from "../models/settings.js";

export interface IBuildProjectGateway {
  // ===========================================================================
  // Schema
  // ===========================================================================

  fetchSchema(projectId: string): Promise<SchemaDocument>;

  /**
   * Persist a reconciled schema. Resolves with the schema as stored, with
   * the ids the backend assigned to new classes and fields.
   */
  postSchema(projectId: string, payload: SchemaPayload): Promise<SchemaDocument>;

  // ===========================================================================
  // Validations
  // ===========================================================================

  fetchValidations(projectId: string): Promise<ValidationDocument>;

  postValidation(projectId: string, payload: ValidationPayload): Promise<PersistedValidation>;

  deleteValidation(projectId: string, ruleId: Identifier): Promise<void>;

  // ===========================================================================
  // UDFs
  // ===========================================================================

  fetchUdfs(projectId: string): Promise<UdfCatalog>;

  createUdf(projectId: string, payload: Udf): Promise<CreatedUdf>;

  /**
   * Start example generation for a UDF (by UDF id) or a prompt-UDF rule (by rule id)
   */
  triggerExamples(projectId: string, udfOrRuleId: Identifier): Promise<void>;

  triggerCodeGeneration(projectId: string, ruleId: Identifier): Promise<void>;

  // ===========================================================================
  // Project
  // ===========================================================================

  fetchSettings(projectId: string): Promise<ProjectSettingsDocument>;

  updateSettings(projectId: string, settings: ProjectSettingsUpdate): Promise<void>;

  createProject(request: CreateProjectRequest): Promise<CreatedProject>;
}

/**
 * Calls the schema reconciler and UDF provisioners make
 */
export type UdfGateway = Pick<IBuildProjectGateway, "createUdf" | "fetchUdfs">;

/**
 * Calls the validation reconciler makes besides UDF provisioning
 */
export type ValidationGateway = Pick<IBuildProjectGateway, "deleteValidation" | "triggerExamples">;
