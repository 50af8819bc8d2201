import type { RuleMatch, RulePredicate, SourceDocument, TreeNode } from "../types.js";
import { commandNodes, extractJobs, imageReferences } from "../pipeline.js";
import { asList, child, isMapping, isScalar, isTrue, scalarText, walk } from "../../utils/tree.js";
import { match, parseImageReference, textOf } from "./shared.js";
import { findAll, terraformResources } from "./terraform.js";

const PRIVILEGED_FLAG = /--privileged(\s|=true|$)/;
const DOCKER_IN_DOCKER = /(^|\/)docker$/;

export const privilegedContainer: RulePredicate = (document) => {
  const matches: RuleMatch[] = [];

  if (document.format === "terraform") {
    walk(document.root, (node) => {
      if (!isMapping(node)) {
        return;
      }
      for (const key of ["privileged", "allow_privilege_escalation"]) {
        const value = child(node, key);
        if (value && isTrue(value)) {
          matches.push(match(value, `Container is configured with ${key} = true`));
        }
      }
    });
    return matches;
  }

  for (const command of commandNodes(document)) {
    if (/\bdocker\s+run\b/.test(textOf(command)) && PRIVILEGED_FLAG.test(textOf(command))) {
      matches.push(match(command, "Command starts a privileged container on the build host"));
    }
  }

  walk(document.root, (node) => {
    const options = child(node, "options");
    if (isScalar(options) && PRIVILEGED_FLAG.test(textOf(options))) {
      matches.push(match(options, "Container options request --privileged"));
    }
  });

  if (document.format === "gitlab-ci") {
    for (const image of imageReferences(document)) {
      const reference = parseImageReference(textOf(image));
      if (DOCKER_IN_DOCKER.test(reference.name) && (reference.tag ?? "").includes("dind")) {
        matches.push(match(image, `Service "${textOf(image)}" needs a privileged runner for Docker-in-Docker`));
      }
    }
  }

  return matches;
};

const USER_OPTION = /(?:^|\s)(?:--user(?:=|\s+)|-u\s+)(\S+)/;
const ROOT_USER = /^(root|0)(:(root|0))?$/;

function containerUserProblem(container: TreeNode): string | undefined {
  const options = scalarText(child(container, "options")) ?? "";
  const user = USER_OPTION.exec(options)?.[1];
  if (user === undefined) {
    return "sets no --user, so it runs as the image's default user (usually root)";
  }
  if (ROOT_USER.test(user.replace(/^["']|["']$/g, ""))) {
    return `runs as root (--user ${user})`;
  }
  return undefined;
}

function pipelineContainers(document: SourceDocument): Array<{ owner: string; node: TreeNode }> {
  const containers: Array<{ owner: string; node: TreeNode }> = [];
  if (document.format === "github-actions") {
    for (const job of extractJobs(document)) {
      const container = child(job.node, "container");
      if (container) {
        containers.push({ owner: `Job "${job.id}" container`, node: container });
      }
    }
    return containers;
  }

  // Scalar containers in Azure name a `resources.containers` alias.
  const rootContainer = child(document.root, "container");
  if (isMapping(rootContainer)) {
    containers.push({ owner: "Pipeline container", node: rootContainer });
  }
  for (const job of extractJobs(document)) {
    const container = child(job.node, "container");
    if (job.node !== document.root && isMapping(container)) {
      containers.push({ owner: `Job "${job.id}" container`, node: container });
    }
  }
  for (const resource of asList(child(child(document.root, "resources"), "containers"))) {
    const name = scalarText(child(resource, "container")) ?? "container";
    containers.push({ owner: `Container resource "${name}"`, node: resource });
  }
  return containers;
}

function runsAsNonRoot(context: TreeNode): boolean | undefined {
  const user = child(context, "run_as_user");
  const userValue = Number(scalarText(user));
  if (user && Number.isFinite(userValue)) {
    return userValue !== 0;
  }
  const nonRoot = child(context, "run_as_non_root");
  if (nonRoot) {
    return isTrue(nonRoot);
  }
  return undefined;
}

export const rootContainerUser: RulePredicate = (document) => {
  const matches: RuleMatch[] = [];

  if (document.format === "terraform") {
    const kubernetes = terraformResources(document.root).filter((resource) => resource.type.startsWith("kubernetes_"));
    for (const resource of kubernetes) {
      const contexts = findAll(resource.body, "security_context");
      const verdicts = contexts.map(runsAsNonRoot);
      if (verdicts.includes(true) && !verdicts.includes(false)) {
        continue;
      }
      const rootContext = contexts.find((context) => runsAsNonRoot(context) === false);
      if (rootContext) {
        matches.push(match(rootContext, `${resource.type}.${resource.name} runs its containers as root`));
        continue;
      }
      for (const container of findAll(resource.body, "container")) {
        matches.push(
          match(container, `${resource.type}.${resource.name} does not require a non-root user for its container`),
        );
      }
    }
    return matches;
  }

  for (const { owner, node } of pipelineContainers(document)) {
    if (isScalar(node)) {
      matches.push(match(node, `${owner} has no options, so it runs as the image's default user (usually root)`));
      continue;
    }
    const problem = containerUserProblem(node);
    if (problem) {
      matches.push(match(node, `${owner} ${problem}`));
    }
  }

  return matches;
};
