import type { RuleMatch, RulePredicate } from "../types.js";
import { extractJobs, isDeployJob } from "../pipeline.js";
import { child, isTrue, scalarText } from "../../utils/tree.js";
import { isDigestPinned, match, textOf } from "./shared.js";
import { nestedBlocks, terraformResources } from "./terraform.js";

const IMAGE_ARGUMENTS: RegExp[] = [
  /\bkubectl\s+set\s+image\s+\S+\s+[A-Za-z0-9_-]+=(\S+)/,
  /--image(?:=|\s+)(\S+)/,
  /\bdocker\s+pull\s+(?:-\S+\s+)*(\S+)/,
];
const HELM_TAG = /\bhelm\s+(upgrade|install)\b.*--set(?:-string)?\s+\S*image\.tag=(\S+)/;
const BARE_VARIABLE = /^["']?\$(\{?[A-Za-z_][A-Za-z0-9_]*\}?|\([A-Za-z0-9_.]+\))["']?$/;

function mutableDeployReference(line: string): string | undefined {
  const helm = HELM_TAG.exec(line);
  if (helm) {
    return `image.tag=${helm[2]}`;
  }
  for (const pattern of IMAGE_ARGUMENTS) {
    const reference = pattern.exec(line)?.[1]?.replace(/^["']|["']$/g, "");
    if (reference && !BARE_VARIABLE.test(reference) && !isDigestPinned(reference)) {
      return reference;
    }
  }
  return undefined;
}

export const deployMutableTag: RulePredicate = (document) => {
  const matches: RuleMatch[] = [];

  for (const job of extractJobs(document)) {
    if (job.hidden || !isDeployJob(job)) {
      continue;
    }
    for (const command of job.steps.flatMap((step) => step.commands)) {
      const reference = textOf(command)
        .split(/\r?\n/)
        .map(mutableDeployReference)
        .find((found) => found !== undefined);
      if (reference) {
        matches.push(
          match(command, `Job "${job.id}" deploys "${reference}" by tag; deploy an immutable digest instead`),
        );
      }
    }
  }

  return matches;
};

export const registryMutableTags: RulePredicate = (document) => {
  const matches: RuleMatch[] = [];

  for (const repository of terraformResources(document.root, ["aws_ecr_repository"])) {
    const mutability = child(repository.body, "image_tag_mutability");
    const value = scalarText(mutability);
    if (value !== "IMMUTABLE") {
      matches.push(
        match(
          mutability ?? repository.body,
          `ECR repository "${repository.name}" allows tags to be overwritten (image_tag_mutability = ${value ?? "MUTABLE"})`,
        ),
      );
    }
  }

  for (const repository of terraformResources(document.root, ["google_artifact_registry_repository"])) {
    if ((scalarText(child(repository.body, "format")) ?? "").toUpperCase() !== "DOCKER") {
      continue;
    }
    const config = nestedBlocks(repository.body, "docker_config")[0];
    if (!isTrue(child(config, "immutable_tags"))) {
      matches.push(
        match(config ?? repository.body, `Artifact Registry repository "${repository.name}" allows tags to be overwritten`),
      );
    }
  }

  return matches;
};

export const registryScanOnPush: RulePredicate = (document) => {
  if (terraformResources(document.root, ["aws_ecr_registry_scanning_configuration"]).length > 0) {
    return [];
  }

  return terraformResources(document.root, ["aws_ecr_repository"]).flatMap((repository) => {
    const scanning = nestedBlocks(repository.body, "image_scanning_configuration")[0];
    const scanOnPush = child(scanning, "scan_on_push");
    if (isTrue(scanOnPush)) {
      return [];
    }
    return [
      match(
        scanOnPush ?? scanning ?? repository.body,
        `ECR repository "${repository.name}" does not scan images on push`,
      ),
    ];
  });
};
