/**
 * Names of the steps in the standard supply-chain workflow.
 */
export const DefaultSteps = {
  GENERATE_METADATA: "generate-metadata",
  TAG_SOURCE: "tag-source",
  STATIC_CODE_ANALYSIS: "static-code-analysis",
  PACKAGE: "package",
  UNIT_TEST: "unit-test",
  PUSH_ARTIFACTS: "push-artifacts",
  CREATE_CONTAINER_IMAGE: "create-container-image",
  PUSH_CONTAINER_IMAGE: "push-container-image",
  SIGN_CONTAINER_IMAGE: "sign-container-image",
  CONTAINER_IMAGE_UNIT_TEST: "container-image-unit-test",
  CONTAINER_IMAGE_STATIC_COMPLIANCE_SCAN: "container-image-static-compliance-scan",
  CONTAINER_IMAGE_STATIC_VULNERABILITY_SCAN: "container-image-static-vulnerability-scan",
  CREATE_DEPLOYMENT_ENVIRONMENT: "create-deployment-environment",
  DEPLOY: "deploy",
  VALIDATE_ENVIRONMENT_CONFIGURATION: "validate-environment-configuration",
  UAT: "uat",
  RUNTIME_VULNERABILITY_SCAN: "runtime-vulnerability-scan",
  CANARY_TEST: "canary-test",
  PUBLISH_WORKFLOW_RESULTS: "publish-workflow-results",
} as const;

export type DefaultStep = (typeof DefaultSteps)[keyof typeof DefaultSteps];
