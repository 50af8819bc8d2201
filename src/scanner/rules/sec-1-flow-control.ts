import type { RuleMatch, RulePredicate, TreeNode } from "../types.js";
import { extractJobs, githubTriggers, hasEnvironment, isDeployJob } from "../pipeline.js";
import { asList, child, hasKey, scalarText } from "../../utils/tree.js";
import { match } from "./shared.js";

const DEFAULT_BRANCHES = new Set(["main", "master", "*", "**"]);

export const deployWithoutApproval: RulePredicate = (document) => {
  const matches: RuleMatch[] = [];

  for (const job of extractJobs(document)) {
    if (job.hidden || !isDeployJob(job)) {
      continue;
    }

    if (document.format === "azure-pipelines") {
      if (job.deployment && hasEnvironment(job)) {
        continue;
      }
      matches.push(
        match(
          job.node,
          job.deployment
            ? `Deployment job "${job.id}" is not bound to an environment, so no approval check applies`
            : `Job "${job.id}" deploys as a plain job; deployment jobs bound to an environment carry approval checks`,
        ),
      );
      continue;
    }

    if (hasEnvironment(job)) {
      continue;
    }
    if (document.format === "gitlab-ci" && scalarText(child(job.node, "when")) === "manual") {
      continue;
    }
    matches.push(
      match(job.node, `Deploy job "${job.id}" runs without an environment or manual approval gate`),
    );
  }

  return matches;
};

function branchNames(node: TreeNode | undefined): string[] {
  return asList(node)
    .map((item) => scalarText(item))
    .filter((name): name is string => name !== undefined);
}

function pushReachesDefaultBranch(config: TreeNode | undefined): boolean {
  const branches = child(config, "branches");
  if (branches) {
    return branchNames(branches).some((branch) => DEFAULT_BRANCHES.has(branch));
  }
  const ignored = child(config, "branches-ignore");
  if (ignored) {
    return !branchNames(ignored).some((branch) => branch === "main" || branch === "master");
  }
  // A tags-only push filter never fires for branch pushes.
  return !hasKey(config, "tags");
}

export const unprotectedPushDeploy: RulePredicate = (document) => {
  const triggers = githubTriggers(document.root);
  if (!triggers.has("push") || !pushReachesDefaultBranch(triggers.get("push"))) {
    return [];
  }

  return extractJobs(document)
    .filter((job) => isDeployJob(job) && !hasKey(job.node, "needs"))
    .map((job) =>
      match(
        job.node,
        `Job "${job.id}" deploys on push to the default branch without depending on a verification job`,
      ),
    );
};
