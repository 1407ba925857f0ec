import fs from "node:fs";
import { fileURLToPath } from "node:url";
import type { ConfigMapping } from "../config/config-value.js";
import { StepResult } from "../results/step-result.js";
import type { StepContext } from "../step-implementer/context.js";
import { StepImplementer } from "../step-implementer/step-implementer.js";

/**
 * `validate-environment-configuration` sub-step that hands the manifests rendered by
 * the deploy step to a later config-lint sub-step.
 *
 * Consumes `argocd-result-set` (a `file://` URL or a path) from an earlier step and
 * publishes it as `configlint-yml-path`. No configuration keys.
 */
export class ConfiglintFromArgocd extends StepImplementer {
  stepImplementerConfigDefaults(): ConfigMapping {
    return {};
  }

  requiredRuntimeStepConfigKeys(): readonly string[] {
    return [];
  }

  async executeStep(context: StepContext): Promise<StepResult> {
    const stepResult = StepResult.fromStepImplementer(this);

    const argocdResultSet = context.getResultValue("argocd-result-set");
    if (argocdResultSet === null || argocdResultSet === undefined) {
      return stepResult.fail("Step results missing argocd-result-set from deploy step");
    }
    if (typeof argocdResultSet !== "string") {
      return stepResult.fail(`argocd-result-set is not a file reference: ${JSON.stringify(argocdResultSet)}`);
    }

    const ymlPath = toFilePath(argocdResultSet);
    if (ymlPath === null) {
      return stepResult.fail(`argocd-result-set is not a valid file URL: ${argocdResultSet}`);
    }
    if (!fs.existsSync(ymlPath)) {
      return stepResult.fail(`argocd-result-set ${ymlPath} not found`);
    }

    stepResult.addArtifact("configlint-yml-path", argocdResultSet, "file");
    return stepResult;
  }
}

function toFilePath(reference: string): string | null {
  if (!reference.startsWith("file:")) return reference;
  try {
    return fileURLToPath(reference);
  } catch {
    return null;
  }
}
