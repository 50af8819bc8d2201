import { describe, expect, it } from "vitest";
import { deployMutableTag, registryMutableTags, registryScanOnPush } from "../sec-9-artifact-integrity.js";
import { gitlab, run, terraform, workflow } from "../../__tests__/helpers.js";

const DIGEST = `sha256:${"b".repeat(64)}`;

describe("deployMutableTag", () => {
  it("flags deploying an image by tag but not by digest", () => {
    const document = workflow(
      "on: push",
      "jobs:",
      "  deploy:",
      "    runs-on: ubuntu-latest",
      "    environment: production",
      "    steps:",
      "      - run: kubectl set image deployment/web web=registry.example.com/web:1.4.2",
      `      - run: kubectl set image deployment/api api=registry.example.com/api@${DIGEST}`,
    );

    expect(run(deployMutableTag, document)).toEqual([
      {
        path: "jobs.deploy.steps[0].run",
        message: 'Job "deploy" deploys "registry.example.com/web:1.4.2" by tag; deploy an immutable digest instead',
      },
    ]);
  });

  it("flags helm image tag overrides and skips bare variables", () => {
    const document = gitlab(
      "deploy_prod:",
      "  environment: production",
      "  script:",
      "    - helm upgrade web ./chart --set image.tag=1.4.2",
      "    - docker pull $IMAGE",
    );

    expect(run(deployMutableTag, document)).toEqual([
      {
        path: "deploy_prod.script[0]",
        message: 'Job "deploy_prod" deploys "image.tag=1.4.2" by tag; deploy an immutable digest instead',
      },
    ]);
  });

  it("ignores jobs that do not deploy", () => {
    const document = workflow(
      "on: push",
      "jobs:",
      "  test:",
      "    runs-on: ubuntu-latest",
      "    steps:",
      "      - run: docker pull node:20",
    );

    expect(run(deployMutableTag, document)).toEqual([]);
  });
});

describe("registry rules", () => {
  it("accepts an immutable ECR repository that scans on push", () => {
    const document = terraform({
      resource: {
        aws_ecr_repository: {
          app: [
            {
              name: "app",
              image_tag_mutability: "IMMUTABLE",
              image_scanning_configuration: [{ scan_on_push: true }],
            },
          ],
        },
      },
    });

    expect(run(registryMutableTags, document)).toEqual([]);
    expect(run(registryScanOnPush, document)).toEqual([]);
  });

  it("flags a mutable ECR repository without scanning", () => {
    const document = terraform({ resource: { aws_ecr_repository: { legacy: [{ name: "legacy" }] } } });

    expect(run(registryMutableTags, document)).toEqual([
      {
        path: "resource.aws_ecr_repository.legacy[0]",
        message: 'ECR repository "legacy" allows tags to be overwritten (image_tag_mutability = MUTABLE)',
      },
    ]);
    expect(run(registryScanOnPush, document)).toEqual([
      { path: "resource.aws_ecr_repository.legacy[0]", message: 'ECR repository "legacy" does not scan images on push' },
    ]);
  });

  it("accepts registry-wide scanning configuration", () => {
    const document = terraform({
      resource: {
        aws_ecr_repository: { legacy: [{ name: "legacy", image_tag_mutability: "IMMUTABLE" }] },
        aws_ecr_registry_scanning_configuration: { main: [{ scan_type: "ENHANCED" }] },
      },
    });

    expect(run(registryScanOnPush, document)).toEqual([]);
  });

  it("flags Docker Artifact Registry repositories without immutable tags", () => {
    const document = terraform({
      resource: {
        google_artifact_registry_repository: {
          images: [{ format: "DOCKER", docker_config: [{ immutable_tags: false }] }],
          packages: [{ format: "NPM" }],
        },
      },
    });

    expect(run(registryMutableTags, document)).toEqual([
      {
        path: "resource.google_artifact_registry_repository.images[0].docker_config[0]",
        message: 'Artifact Registry repository "images" allows tags to be overwritten',
      },
    ]);
  });
});
