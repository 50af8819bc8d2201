import type { MappingNode, ScalarNode, SourceDocument, TreeNode } from "./types.js";
import {
  asList,
  child,
  collectScalars,
  isMapping,
  isScalar,
  isSequence,
  mappingEntries,
  scalarText,
  walk,
} from "../utils/tree.js";

export interface PipelineStep {
  node: TreeNode;
  /** Shell script bodies the step runs. */
  commands: ScalarNode[];
  /** Action (`uses`) or task reference. */
  uses?: ScalarNode;
}

export interface PipelineJob {
  id: string;
  node: MappingNode;
  /** Azure `deployment:` jobs carry their environment gate natively. */
  deployment: boolean;
  /** GitLab hidden jobs (`.template`) only run through `extends`. */
  hidden: boolean;
  steps: PipelineStep[];
}

const GITLAB_RESERVED = new Set([
  "stages",
  "variables",
  "default",
  "include",
  "workflow",
  "image",
  "services",
  "before_script",
  "after_script",
  "cache",
  "spec",
]);

const GITLAB_SCRIPT_KEYS = ["before_script", "script", "after_script"];
const AZURE_SCRIPT_KEYS = ["script", "bash", "pwsh", "powershell"];

/** Whole words, so `product-tests` is not a deploy job. */
const DEPLOY_NAME = /(^|[^a-z])(deploy(s|ment)?|release|publish|prod|production|rollout)([^a-z]|$)/i;
const DEPLOY_COMMAND =
  /\b(kubectl\s+(apply|set\s+image|rollout)|helm\s+(upgrade|install)|terraform\s+apply|aws\s+ecs\s+update-service|az\s+(webapp|containerapp)\s+(deploy|update|up)|gcloud\s+(run|app)\s+deploy|serverless\s+deploy|cdk\s+deploy|pulumi\s+up)\b/i;

export function extractJobs(document: SourceDocument): PipelineJob[] {
  switch (document.format) {
    case "github-actions":
      return githubJobs(document.root);
    case "gitlab-ci":
      return gitlabJobs(document.root);
    case "azure-pipelines":
      return azureJobs(document.root);
    default:
      return [];
  }
}

function githubJobs(root: TreeNode): PipelineJob[] {
  return mappingEntries(child(root, "jobs")).flatMap(({ key, value }) => {
    if (!isMapping(value)) {
      return [];
    }
    const steps = asList(child(value, "steps")).map((step): PipelineStep => {
      const run = child(step, "run");
      const uses = child(step, "uses");
      return {
        node: step,
        commands: isScalar(run) ? [run] : [],
        uses: isScalar(uses) ? uses : undefined,
      };
    });
    return [{ id: key, node: value, deployment: false, hidden: false, steps }];
  });
}

function gitlabScripts(node: TreeNode | undefined): ScalarNode[] {
  return GITLAB_SCRIPT_KEYS.flatMap((key) => {
    const script = child(node, key);
    return script ? collectScalars(script).filter((scalar) => typeof scalar.value === "string") : [];
  });
}

function gitlabJobs(root: TreeNode): PipelineJob[] {
  return mappingEntries(root).flatMap(({ key, value }) => {
    if (GITLAB_RESERVED.has(key) || !isMapping(value)) {
      return [];
    }
    return [
      {
        id: key,
        node: value,
        deployment: false,
        hidden: key.startsWith("."),
        steps: [{ node: value, commands: gitlabScripts(value) }],
      },
    ];
  });
}

function azureStep(step: TreeNode): PipelineStep {
  const commands = AZURE_SCRIPT_KEYS.map((key) => child(step, key)).filter(isScalar);
  const task = child(step, "task");
  return { node: step, commands, uses: isScalar(task) ? task : undefined };
}

function azureStepsWithin(node: TreeNode): PipelineStep[] {
  const steps: PipelineStep[] = [];
  walk(node, (current) => {
    if (!isMapping(current)) {
      return;
    }
    const list = child(current, "steps");
    if (isSequence(list)) {
      steps.push(...list.items.map(azureStep));
    }
  });
  return steps;
}

function azureJobs(root: TreeNode): PipelineJob[] {
  const jobNodes: TreeNode[] = [];
  for (const stage of asList(child(root, "stages"))) {
    jobNodes.push(...asList(child(stage, "jobs")));
  }
  jobNodes.push(...asList(child(root, "jobs")));

  const jobs = jobNodes.filter(isMapping).map((node): PipelineJob => {
    const deployment = scalarText(child(node, "deployment"));
    const id = deployment ?? scalarText(child(node, "job")) ?? scalarText(child(node, "template")) ?? "job";
    return {
      id,
      node,
      deployment: deployment !== undefined,
      hidden: false,
      steps: azureStepsWithin(node),
    };
  });

  const rootSteps = child(root, "steps");
  if (isMapping(root) && isSequence(rootSteps)) {
    jobs.push({
      id: "(pipeline)",
      node: root,
      deployment: false,
      hidden: false,
      steps: rootSteps.items.map(azureStep),
    });
  }
  return jobs;
}

/** Every shell script body in the document, including GitLab's global scripts. */
export function commandNodes(document: SourceDocument): ScalarNode[] {
  const commands = extractJobs(document).flatMap((job) => job.steps.flatMap((step) => step.commands));
  if (document.format === "gitlab-ci") {
    commands.unshift(...gitlabScripts(document.root), ...gitlabScripts(child(document.root, "default")));
  }
  return commands;
}

export function jobDisplayName(job: PipelineJob): string {
  return scalarText(child(job.node, "name")) ?? scalarText(child(job.node, "displayName")) ?? job.id;
}

export function isDeployJob(job: PipelineJob): boolean {
  if (job.deployment || hasEnvironment(job)) {
    return true;
  }
  if (isDeployName(job.id) || isDeployName(jobDisplayName(job))) {
    return true;
  }
  return job.steps.some((step) =>
    step.commands.some((command) => DEPLOY_COMMAND.test(scalarText(command) ?? "")),
  );
}

function isDeployName(name: string): boolean {
  return DEPLOY_NAME.test(name.replace(/([a-z0-9])([A-Z])/g, "$1 $2"));
}

export function hasEnvironment(job: PipelineJob): boolean {
  const environment = child(job.node, "environment");
  if (!environment) {
    return false;
  }
  if (isScalar(environment)) {
    return (scalarText(environment) ?? "").trim().length > 0;
  }
  return true;
}

function imageFrom(node: TreeNode | undefined, key: string): ScalarNode | undefined {
  if (isScalar(node)) {
    return typeof node.value === "string" ? node : undefined;
  }
  const image = child(node, key);
  return isScalar(image) && typeof image.value === "string" ? image : undefined;
}

/** Container image references: job containers, services, `docker://` actions, Azure resources. */
export function imageReferences(document: SourceDocument): ScalarNode[] {
  const root = document.root;
  const images: ScalarNode[] = [];
  const push = (node: ScalarNode | undefined): void => {
    if (node) {
      images.push(node);
    }
  };

  switch (document.format) {
    case "github-actions":
      for (const job of githubJobs(root)) {
        push(imageFrom(child(job.node, "container"), "image"));
        for (const service of mappingEntries(child(job.node, "services"))) {
          push(imageFrom(service.value, "image"));
        }
        for (const step of job.steps) {
          const uses = scalarText(step.uses);
          if (step.uses && uses?.startsWith("docker://")) {
            push(step.uses);
          }
        }
      }
      break;
    case "gitlab-ci": {
      const scopes: TreeNode[] = [root];
      const defaults = child(root, "default");
      if (defaults) {
        scopes.push(defaults);
      }
      scopes.push(...gitlabJobs(root).map((job) => job.node));
      for (const scope of scopes) {
        push(imageFrom(child(scope, "image"), "name"));
        for (const service of asList(child(scope, "services"))) {
          push(imageFrom(service, "name"));
        }
      }
      break;
    }
    case "azure-pipelines":
      push(imageFrom(child(root, "container"), "image"));
      for (const job of azureJobs(root)) {
        if (job.node !== root) {
          push(imageFrom(child(job.node, "container"), "image"));
        }
      }
      for (const container of asList(child(child(root, "resources"), "containers"))) {
        push(imageFrom(container, "image"));
      }
      break;
    default:
      break;
  }
  return images;
}

/** GitHub workflow trigger events mapped to their configuration node (if any). */
export function githubTriggers(root: TreeNode): Map<string, TreeNode | undefined> {
  const triggers = new Map<string, TreeNode | undefined>();
  const on = child(root, "on");
  if (isMapping(on)) {
    for (const entry of on.entries) {
      triggers.set(entry.key, entry.value);
    }
  } else {
    for (const event of asList(on)) {
      const name = scalarText(event);
      if (name) {
        triggers.set(name, undefined);
      }
    }
  }
  return triggers;
}
