import { describe, expect, it } from "vitest";
import { auditLoggingDisabled, noArtifactRetention } from "../sec-10-logging.js";
import { azure, gitlab, run, terraform, workflow } from "../../__tests__/helpers.js";

const BUILD_JOB = [
  "on: push",
  "jobs:",
  "  build:",
  "    runs-on: ubuntu-latest",
  "    steps:",
  "      - run: docker build -t app .",
];

describe("noArtifactRetention", () => {
  it("flags a build that keeps nothing for audit", () => {
    expect(run(noArtifactRetention, workflow(...BUILD_JOB))).toEqual([
      {
        path: "$",
        message: "Pipeline builds or deploys but keeps no artifacts, attestations or provenance for later audit",
      },
    ]);
  });

  it("accepts uploaded artifacts or provenance", () => {
    const uploaded = workflow(...BUILD_JOB, "      - uses: actions/upload-artifact@v4");
    const signed = workflow(...BUILD_JOB, "      - run: cosign sign --yes registry.example.com/app");

    expect(run(noArtifactRetention, uploaded)).toEqual([]);
    expect(run(noArtifactRetention, signed)).toEqual([]);
  });

  it("accepts GitLab artifacts and Azure publish steps", () => {
    const gitlabDocument = gitlab(
      "build:",
      "  script:",
      "    - go build ./...",
      "  artifacts:",
      "    paths:",
      "      - bin/",
    );
    const azureDocument = azure("steps:", "  - script: dotnet publish -c Release", "  - publish: out", "    artifact: app");

    expect(run(noArtifactRetention, gitlabDocument)).toEqual([]);
    expect(run(noArtifactRetention, azureDocument)).toEqual([]);
  });

  it("ignores pipelines that neither build nor deploy", () => {
    const document = gitlab("lint:", "  script:", "    - npm run lint");

    expect(run(noArtifactRetention, document)).toEqual([]);
  });
});

describe("auditLoggingDisabled", () => {
  it("flags CloudTrail with logging off or no log validation", () => {
    const document = terraform({
      resource: {
        aws_cloudtrail: {
          off: [{ name: "off", enable_logging: false }],
          unvalidated: [{ name: "unvalidated" }],
          good: [{ name: "good", enable_log_file_validation: true }],
        },
      },
    });

    expect(run(auditLoggingDisabled, document)).toEqual([
      { path: "resource.aws_cloudtrail.off[0].enable_logging", message: 'CloudTrail "off" has logging turned off' },
      {
        path: "resource.aws_cloudtrail.unvalidated[0]",
        message: 'CloudTrail "unvalidated" does not validate its log files',
      },
    ]);
  });
});
