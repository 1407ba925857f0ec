import { validateWithSchema, type SchemaValidationResult } from "../schema/ajv.js";
import { PIPELINE_CONFIG_SCHEMA } from "../schema/schemas.js";

export type ConfigValidationResult = SchemaValidationResult;

/** Validate a plain pipeline definition document against the pipeline config schema. */
export function validatePipelineConfig(document: unknown): ConfigValidationResult {
  return validateWithSchema("pipeline-config", PIPELINE_CONFIG_SCHEMA, document);
}
