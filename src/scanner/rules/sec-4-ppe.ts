import type { RuleMatch, RulePredicate, SourceDocument, TreeNode } from "../types.js";
import { extractJobs, githubTriggers, hasEnvironment } from "../pipeline.js";
import { child, collectScalars, isMapping, scalarText } from "../../utils/tree.js";
import { match, textOf } from "./shared.js";

const PULL_REQUEST_EVENTS = [
  "pull_request",
  "pull_request_target",
  "pull_request_review",
  "pull_request_review_comment",
  "issue_comment",
  "workflow_run",
];

/** Events whose runs get a privileged token and secrets while acting on contributor code. */
const PRIVILEGED_EVENTS = ["pull_request_target", "workflow_run"];

function eventsFrom(document: SourceDocument, events: readonly string[]): string[] {
  const triggers = githubTriggers(document.root);
  return events.filter((event) => triggers.has(event));
}

/** Describes a write grant in a `permissions` node, or undefined if it grants none. */
export function describeWriteGrant(permissions: TreeNode | undefined): string | undefined {
  const scalar = scalarText(permissions);
  if (scalar !== undefined) {
    return scalar === "write-all" ? "write-all" : undefined;
  }
  if (!isMapping(permissions)) {
    return undefined;
  }
  const written = permissions.entries
    .filter((entry) => scalarText(entry.value) === "write")
    .map((entry) => `${entry.key}: write`);
  return written.length > 0 ? written.join(", ") : undefined;
}

export const prWritePermissions: RulePredicate = (document) => {
  const events = eventsFrom(document, PULL_REQUEST_EVENTS);
  if (events.length === 0) {
    return [];
  }
  const matches: RuleMatch[] = [];
  const trigger = events.join(", ");

  const topLevel = child(document.root, "permissions");
  const topGrant = describeWriteGrant(topLevel);
  if (topLevel && topGrant) {
    matches.push(match(topLevel, `Workflow triggered by ${trigger} grants ${topGrant} to every job`));
  }

  for (const job of extractJobs(document)) {
    const permissions = child(job.node, "permissions");
    const grant = describeWriteGrant(permissions);
    if (permissions && grant) {
      matches.push(match(permissions, `Job "${job.id}" runs on ${trigger} with ${grant}`));
    }
  }

  return matches;
};

const UNTRUSTED_REF =
  /github\.event\.pull_request\.head\.(sha|ref)|github\.head_ref|github\.event\.workflow_run\.head_(sha|branch)|refs\/pull\//;
const UNTRUSTED_FETCH = /\b(git\s+(fetch|checkout)|gh\s+pr\s+checkout)\b/;

export const prTargetUntrustedCheckout: RulePredicate = (document) => {
  const events = eventsFrom(document, PRIVILEGED_EVENTS);
  if (events.length === 0) {
    return [];
  }
  const matches: RuleMatch[] = [];

  for (const job of extractJobs(document)) {
    for (const step of job.steps) {
      const uses = textOf(step.uses);
      if (uses.startsWith("actions/checkout")) {
        const ref = child(child(step.node, "with"), "ref");
        if (ref && UNTRUSTED_REF.test(scalarText(ref) ?? "")) {
          matches.push(match(ref, `Job "${job.id}" checks out pull request code in a ${events.join("/")} run`));
        }
      }
      for (const command of step.commands) {
        const text = textOf(command);
        if (UNTRUSTED_FETCH.test(text) && (UNTRUSTED_REF.test(text) || /gh\s+pr\s+checkout/.test(text))) {
          matches.push(match(command, `Job "${job.id}" fetches pull request code in a ${events.join("/")} run`));
        }
      }
    }
  }

  return matches;
};

const SECRET_REFERENCE = /\$\{\{[^}]*\bsecrets\.(?!GITHUB_TOKEN\b)[A-Za-z_]/;

/** Events that run with repository secrets while a contributor controls the input. */
const SECRET_EXPOSING_EVENTS = [...PRIVILEGED_EVENTS, "issue_comment"];

/** Pull request events whose runs get secrets for branches pushed to the base repository. */
const SAME_REPO_PR_EVENTS = ["pull_request", "pull_request_review", "pull_request_review_comment"];

/** Jobs bound to an environment are left alone: its reviewers gate the secrets. */
function secretReads(document: SourceDocument, trigger: string): RuleMatch[] {
  const matches: RuleMatch[] = [];

  for (const job of extractJobs(document)) {
    if (hasEnvironment(job)) {
      continue;
    }
    const inherited = child(job.node, "secrets");
    if (inherited && scalarText(inherited) === "inherit") {
      matches.push(match(inherited, `Job "${job.id}" passes every secret to a reusable workflow on ${trigger}`));
    }
    for (const scalar of collectScalars(job.node)) {
      if (typeof scalar.value === "string" && SECRET_REFERENCE.test(scalar.value)) {
        matches.push(match(scalar, `Job "${job.id}" reads repository secrets on ${trigger}`));
      }
    }
  }

  return matches;
}

export const privilegedEventSecrets: RulePredicate = (document) => {
  const events = eventsFrom(document, SECRET_EXPOSING_EVENTS);
  return events.length === 0 ? [] : secretReads(document, events.join("/"));
};

/** Left to `privilegedEventSecrets` when the workflow also has a privileged trigger. */
export const pullRequestSecrets: RulePredicate = (document) => {
  if (eventsFrom(document, SECRET_EXPOSING_EVENTS).length > 0) {
    return [];
  }
  const events = eventsFrom(document, SAME_REPO_PR_EVENTS);
  return events.length === 0 ? [] : secretReads(document, events.join("/"));
};
