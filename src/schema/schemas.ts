/** JSON Schemas for the documents supplyctl reads. */

const SUB_STEP_SCHEMA = {
  type: "object",
  required: ["implementer"],
  properties: {
    implementer: { type: "string", minLength: 1 },
    name: { type: "string", minLength: 1 },
    config: { type: "object" },
    "environment-config": { type: "object", additionalProperties: { type: "object" } },
  },
  additionalProperties: false,
};

export const PIPELINE_CONFIG_SCHEMA = {
  type: "object",
  required: ["tssc-config"],
  properties: {
    "tssc-config": {
      type: "object",
      properties: {
        "global-defaults": { type: "object" },
        "global-environment-defaults": { type: "object", additionalProperties: { type: "object" } },
      },
      additionalProperties: {
        oneOf: [SUB_STEP_SCHEMA, { type: "array", items: SUB_STEP_SCHEMA, minItems: 1 }],
      },
    },
  },
};

export const SNAPSHOT_FORMAT = "supplyctl-workflow-result";
export const SNAPSHOT_VERSION = 1;

const ARTIFACT_SCHEMA = {
  type: "object",
  required: ["name", "value_type"],
  properties: {
    name: { type: "string", minLength: 1 },
    value: {},
    value_type: { type: "string" },
  },
  additionalProperties: false,
};

export const WORKFLOW_RESULT_SNAPSHOT_SCHEMA = {
  type: "object",
  required: ["format", "version", "written_at", "results"],
  properties: {
    format: { const: SNAPSHOT_FORMAT },
    version: { const: SNAPSHOT_VERSION },
    written_at: { type: "string", format: "date-time" },
    results: {
      type: "array",
      items: {
        type: "object",
        required: ["step_name", "sub_step_name", "sub_step_implementer_name", "success", "message", "artifacts"],
        properties: {
          step_name: { type: "string" },
          sub_step_name: { type: "string" },
          sub_step_implementer_name: { type: "string" },
          success: { type: "boolean" },
          message: { type: "string" },
          artifacts: { type: "array", items: ARTIFACT_SCHEMA },
        },
        additionalProperties: false,
      },
    },
  },
};
