import { describe, expect, it } from "vitest";
import { privilegedContainer, rootContainerUser } from "../sec-7-system-config.js";
import { azure, gitlab, run, terraform, workflow } from "../../__tests__/helpers.js";

describe("privilegedContainer", () => {
  it("flags Docker-in-Docker services", () => {
    const document = gitlab(
      "build:",
      "  image: docker:24",
      "  services:",
      "    - docker:24-dind",
      "  script:",
      "    - docker build -t app .",
    );

    expect(run(privilegedContainer, document)).toEqual([
      { path: "build.services[0]", message: 'Service "docker:24-dind" needs a privileged runner for Docker-in-Docker' },
    ]);
  });

  it("flags privileged docker run and container options", () => {
    const document = workflow(
      "on: push",
      "jobs:",
      "  build:",
      "    runs-on: ubuntu-latest",
      "    container:",
      "      image: node:20",
      "      options: --privileged",
      "    steps:",
      "      - run: docker run --privileged alpine true",
    );

    expect(run(privilegedContainer, document)).toEqual([
      { path: "jobs.build.steps[0].run", message: "Command starts a privileged container on the build host" },
      { path: "jobs.build.container.options", message: "Container options request --privileged" },
    ]);
  });

  it("flags privileged Terraform security contexts", () => {
    const document = terraform({
      resource: {
        kubernetes_pod: {
          app: [{ spec: [{ container: [{ name: "app", security_context: [{ privileged: true }] }] }] }],
        },
      },
    });

    expect(run(privilegedContainer, document)).toEqual([
      {
        path: "resource.kubernetes_pod.app[0].spec[0].container[0].security_context[0].privileged",
        message: "Container is configured with privileged = true",
      },
    ]);
  });
});

describe("rootContainerUser", () => {
  it("flags GitHub job containers without a non-root user", () => {
    const document = workflow(
      "on: push",
      "jobs:",
      "  build:",
      "    runs-on: ubuntu-latest",
      "    container:",
      "      image: node:20",
      "    steps:",
      "      - run: make",
      "  test:",
      "    runs-on: ubuntu-latest",
      "    container:",
      "      image: node:20",
      "      options: --user 1001",
      "    steps:",
      "      - run: make test",
      "  admin:",
      "    runs-on: ubuntu-latest",
      "    container:",
      "      image: node:20",
      "      options: --user root",
      "    steps:",
      "      - run: make admin",
    );

    expect(run(rootContainerUser, document)).toEqual([
      {
        path: "jobs.build.container",
        message: 'Job "build" container sets no --user, so it runs as the image\'s default user (usually root)',
      },
      { path: "jobs.admin.container", message: 'Job "admin" container runs as root (--user root)' },
    ]);
  });

  it("checks Azure container resources", () => {
    const document = azure(
      "resources:",
      "  containers:",
      "    - container: builder",
      "      image: ubuntu:22.04",
      "      options: -u 1000",
      "    - container: legacy",
      "      image: ubuntu:22.04",
      "steps:",
      "  - script: make",
    );

    expect(run(rootContainerUser, document)).toEqual([
      {
        path: "resources.containers[1]",
        message:
          'Container resource "legacy" sets no --user, so it runs as the image\'s default user (usually root)',
      },
    ]);
  });

  it("flags Kubernetes workloads that do not require a non-root user", () => {
    const document = terraform({
      resource: {
        kubernetes_deployment: {
          web: [{ spec: [{ template: [{ spec: [{ container: [{ name: "web", image: "nginx:1.25" }] }] }] }] }],
          api: [
            {
              spec: [
                {
                  template: [
                    {
                      spec: [
                        {
                          security_context: [{ run_as_non_root: true }],
                          container: [{ name: "api", image: "api:1.0" }],
                        },
                      ],
                    },
                  ],
                },
              ],
            },
          ],
        },
      },
    });

    expect(run(rootContainerUser, document)).toEqual([
      {
        path: "resource.kubernetes_deployment.web[0].spec[0].template[0].spec[0].container[0]",
        message: "kubernetes_deployment.web does not require a non-root user for its container",
      },
    ]);
  });

  it("flags an explicit root user in a security context", () => {
    const document = terraform({
      resource: {
        kubernetes_pod: { tools: [{ spec: [{ security_context: [{ run_as_user: 0 }], container: [{ name: "t" }] }] }] },
      },
    });

    expect(run(rootContainerUser, document)).toEqual([
      {
        path: "resource.kubernetes_pod.tools[0].spec[0].security_context[0]",
        message: "kubernetes_pod.tools runs its containers as root",
      },
    ]);
  });
});
