import type { RuleMatch, RulePredicate } from "../types.js";
import { extractJobs } from "../pipeline.js";
import { child, hasKey, isTrue, scalarText } from "../../utils/tree.js";
import { match } from "./shared.js";

export const missingPermissions: RulePredicate = (document) => {
  if (hasKey(document.root, "permissions")) {
    return [];
  }
  return extractJobs(document)
    .filter((job) => !hasKey(job.node, "permissions"))
    .map((job) =>
      match(
        job.node,
        `Job "${job.id}" inherits the default GITHUB_TOKEN permissions; declare a least-privilege permissions block`,
      ),
    );
};

export const broadPermissions: RulePredicate = (document) => {
  const matches: RuleMatch[] = [];

  const topLevel = child(document.root, "permissions");
  if (topLevel && scalarText(topLevel) === "write-all") {
    matches.push(match(topLevel, "Workflow grants write-all permissions to every job"));
  }

  for (const job of extractJobs(document)) {
    const permissions = child(job.node, "permissions");
    if (permissions && scalarText(permissions) === "write-all") {
      matches.push(match(permissions, `Job "${job.id}" is granted write-all permissions`));
    }
  }

  return matches;
};

export const persistedCheckoutCredentials: RulePredicate = (document) => {
  const matches: RuleMatch[] = [];

  for (const job of extractJobs(document)) {
    for (const step of job.steps) {
      if (!hasKey(step.node, "checkout")) {
        continue;
      }
      const persist = child(step.node, "persistCredentials");
      if (persist && isTrue(persist)) {
        matches.push(
          match(persist, `Job "${job.id}" keeps the pipeline access token in the git config for every later step`),
        );
      }
    }
  }

  return matches;
};
