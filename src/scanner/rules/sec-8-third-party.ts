import type { RuleMatch, RulePredicate, ScalarNode, SourceDocument, TreeNode } from "../types.js";
import { extractJobs } from "../pipeline.js";
import { asList, child, isMapping, isScalar, scalarText } from "../../utils/tree.js";
import { FULL_COMMIT_SHA, VERSION_TAG, isExpression, match, textOf } from "./shared.js";
import { labeledBlocks } from "./terraform.js";

/** A ref that cannot move under a consumer: a full commit SHA or a version tag. */
export function isImmutableRef(ref: string): boolean {
  const bare = ref.replace(/^refs\/tags\//, "");
  return FULL_COMMIT_SHA.test(bare) || VERSION_TAG.test(bare);
}

function actionReferences(document: SourceDocument): Array<{ job: string; node: ScalarNode }> {
  const references: Array<{ job: string; node: ScalarNode }> = [];
  for (const job of extractJobs(document)) {
    const reusable = child(job.node, "uses");
    if (isScalar(reusable)) {
      references.push({ job: job.id, node: reusable });
    }
    for (const step of job.steps) {
      if (step.uses) {
        references.push({ job: job.id, node: step.uses });
      }
    }
  }
  return references;
}

export const unpinnedAction: RulePredicate = (document) => {
  const matches: RuleMatch[] = [];

  for (const { job, node } of actionReferences(document)) {
    const reference = textOf(node).trim();
    if (reference.startsWith("./") || reference.startsWith("docker://") || isExpression(reference)) {
      continue;
    }
    const at = reference.lastIndexOf("@");
    if (at === -1) {
      matches.push(match(node, `Job "${job}" uses "${reference}" without any ref`));
      continue;
    }
    const ref = reference.slice(at + 1);
    if (!isImmutableRef(ref)) {
      matches.push(
        match(node, `Job "${job}" uses "${reference}" at mutable ref "${ref}"; pin a full commit SHA`),
      );
    }
  }

  return matches;
};

function gitlabIncludeProblem(include: TreeNode): { node: TreeNode; message: string } | undefined {
  if (isScalar(include)) {
    const value = textOf(include);
    return /^https?:\/\//.test(value)
      ? { node: include, message: `Remote include "${value}" is fetched unpinned at pipeline start` }
      : undefined;
  }
  if (!isMapping(include)) {
    return undefined;
  }

  const project = scalarText(child(include, "project"));
  if (project) {
    const ref = child(include, "ref");
    const refText = scalarText(ref);
    if (!refText) {
      return { node: include, message: `Include from project "${project}" follows its default branch` };
    }
    return isImmutableRef(refText)
      ? undefined
      : { node: ref ?? include, message: `Include from project "${project}" tracks mutable ref "${refText}"` };
  }

  const remote = scalarText(child(include, "remote"));
  if (remote) {
    return child(include, "integrity")
      ? undefined
      : { node: include, message: `Remote include "${remote}" has no integrity hash` };
  }

  const componentNode = child(include, "component");
  const component = scalarText(componentNode);
  if (componentNode && component) {
    const at = component.lastIndexOf("@");
    const version = at === -1 ? "" : component.slice(at + 1);
    if (!isImmutableRef(version)) {
      return {
        node: componentNode,
        message: `Component "${component}" is not pinned to a released version or commit`,
      };
    }
  }
  return undefined;
}

function azureRepositoryProblem(repository: TreeNode): { node: TreeNode; message: string } | undefined {
  const type = scalarText(child(repository, "type"));
  const name = scalarText(child(repository, "name")) ?? scalarText(child(repository, "repository")) ?? "repository";
  if (!type || type === "pipelines") {
    return undefined;
  }
  const ref = child(repository, "ref");
  const refText = scalarText(ref);
  if (!refText) {
    return { node: repository, message: `Template repository "${name}" follows its default branch` };
  }
  return isImmutableRef(refText)
    ? undefined
    : { node: ref ?? repository, message: `Template repository "${name}" tracks mutable ref "${refText}"` };
}

export const mutableTemplateRef: RulePredicate = (document) => {
  const problems =
    document.format === "gitlab-ci"
      ? asList(child(document.root, "include")).map(gitlabIncludeProblem)
      : asList(child(child(document.root, "resources"), "repositories")).map(azureRepositoryProblem);

  return problems
    .filter((problem): problem is { node: TreeNode; message: string } => problem !== undefined)
    .map((problem) => match(problem.node, problem.message));
};

const REGISTRY_SOURCE = /^([a-z0-9.-]+\.[a-z]{2,}\/)?[A-Za-z0-9_-]+\/[A-Za-z0-9_-]+\/[A-Za-z0-9_-]+$/;
const GIT_SOURCE = /^(git::|git@|github\.com\/|bitbucket\.org\/)|\.git(\/\/|\?|$)/;

export const unpinnedModule: RulePredicate = (document) => {
  const matches: RuleMatch[] = [];

  for (const block of labeledBlocks(document.root, "module")) {
    const sourceNode = child(block.body, "source");
    const source = scalarText(sourceNode);
    if (!sourceNode || !source || source.startsWith("./") || source.startsWith("../")) {
      continue;
    }

    if (GIT_SOURCE.test(source)) {
      const ref = /[?&]ref=([^&]+)/.exec(source)?.[1];
      if (!ref) {
        matches.push(match(sourceNode, `Module "${block.name}" tracks the default branch of ${source}`));
      } else if (!isImmutableRef(ref)) {
        matches.push(match(sourceNode, `Module "${block.name}" is sourced from mutable ref "${ref}"`));
      }
    } else if (REGISTRY_SOURCE.test(source) && !child(block.body, "version")) {
      matches.push(match(sourceNode, `Registry module "${block.name}" has no version constraint`));
    }
  }

  return matches;
};
