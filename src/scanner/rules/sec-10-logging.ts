import type { RulePredicate, SourceDocument } from "../types.js";
import { commandNodes, extractJobs, isDeployJob } from "../pipeline.js";
import { child, hasKey, isTrue, scalarText } from "../../utils/tree.js";
import { match, textOf } from "./shared.js";
import { terraformResources } from "./terraform.js";

const BUILD_COMMAND =
  /\b(docker\s+(build|push)|buildah\s+bud|npm\s+run\s+build|yarn\s+build|mvn\s+(package|deploy|install)|gradle\w*\s+(build|assemble)|go\s+build|dotnet\s+(publish|pack)|cargo\s+build|python\s+-m\s+build)\b/;
const PROVENANCE_COMMAND = /\b(cosign\s+(sign|attest)|slsa-verifier|syft\b)/;
const GITHUB_RETENTION_ACTION = /^actions\/(upload-artifact|attest|attest-build-provenance|attest-sbom)@/;
const AZURE_PUBLISH_TASK = /^(PublishPipelineArtifact|PublishBuildArtifacts|UniversalPackages)@/;

function producesArtifacts(document: SourceDocument): boolean {
  return (
    extractJobs(document).some((job) => !job.hidden && isDeployJob(job)) ||
    commandNodes(document).some((command) => BUILD_COMMAND.test(textOf(command)))
  );
}

function retainsArtifacts(document: SourceDocument): boolean {
  if (commandNodes(document).some((command) => PROVENANCE_COMMAND.test(textOf(command)))) {
    return true;
  }
  const jobs = extractJobs(document);
  switch (document.format) {
    case "github-actions":
      return jobs.some((job) => job.steps.some((step) => GITHUB_RETENTION_ACTION.test(textOf(step.uses))));
    case "gitlab-ci":
      return jobs.some((job) => hasKey(job.node, "artifacts"));
    case "azure-pipelines":
      return jobs.some((job) =>
        job.steps.some((step) => AZURE_PUBLISH_TASK.test(textOf(step.uses)) || hasKey(step.node, "publish")),
      );
    default:
      return false;
  }
}

export const noArtifactRetention: RulePredicate = (document) => {
  if (!producesArtifacts(document) || retainsArtifacts(document)) {
    return [];
  }
  return [
    match(
      document.root,
      "Pipeline builds or deploys but keeps no artifacts, attestations or provenance for later audit",
    ),
  ];
};

export const auditLoggingDisabled: RulePredicate = (document) =>
  terraformResources(document.root, ["aws_cloudtrail"]).flatMap((trail) => {
    const logging = child(trail.body, "enable_logging");
    if (logging && scalarText(logging) === "false") {
      return [match(logging, `CloudTrail "${trail.name}" has logging turned off`)];
    }
    const validation = child(trail.body, "enable_log_file_validation");
    if (!isTrue(validation)) {
      return [match(validation ?? trail.body, `CloudTrail "${trail.name}" does not validate its log files`)];
    }
    return [];
  });
