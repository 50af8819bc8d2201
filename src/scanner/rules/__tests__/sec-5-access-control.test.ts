import { describe, expect, it } from "vitest";
import { broadPermissions, missingPermissions, persistedCheckoutCredentials } from "../sec-5-access-control.js";
import { azure, run, workflow } from "../../__tests__/helpers.js";

describe("missingPermissions", () => {
  it("flags every job when the workflow declares no permissions", () => {
    const document = workflow(
      "on: push",
      "jobs:",
      "  lint:",
      "    runs-on: ubuntu-latest",
      "    steps:",
      "      - run: make lint",
      "  test:",
      "    runs-on: ubuntu-latest",
      "    permissions:",
      "      contents: read",
      "    steps:",
      "      - run: make test",
    );

    expect(run(missingPermissions, document)).toEqual([
      {
        path: "jobs.lint",
        message: 'Job "lint" inherits the default GITHUB_TOKEN permissions; declare a least-privilege permissions block',
      },
    ]);
  });

  it("accepts a workflow-level permissions block", () => {
    const document = workflow(
      "on: push",
      "permissions: {}",
      "jobs:",
      "  lint:",
      "    runs-on: ubuntu-latest",
      "    steps:",
      "      - run: make lint",
    );

    expect(run(missingPermissions, document)).toEqual([]);
  });
});

describe("broadPermissions", () => {
  it("flags write-all at workflow and job level", () => {
    const document = workflow(
      "on: push",
      "permissions: write-all",
      "jobs:",
      "  release:",
      "    runs-on: ubuntu-latest",
      "    permissions: write-all",
      "    steps:",
      "      - run: make release",
    );

    expect(run(broadPermissions, document)).toEqual([
      { path: "permissions", message: "Workflow grants write-all permissions to every job" },
      { path: "jobs.release.permissions", message: 'Job "release" is granted write-all permissions' },
    ]);
  });
});

describe("persistedCheckoutCredentials", () => {
  it("flags checkout steps that keep the access token", () => {
    const document = azure(
      "steps:",
      "  - checkout: self",
      "    persistCredentials: true",
      "  - checkout: tools",
      "  - script: make",
    );

    expect(run(persistedCheckoutCredentials, document)).toEqual([
      {
        path: "steps[0].persistCredentials",
        message: 'Job "(pipeline)" keeps the pipeline access token in the git config for every later step',
      },
    ]);
  });
});
