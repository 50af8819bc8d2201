import type { RuleMatch, RulePredicate } from "../types.js";
import { child, hasKey, isMapping, isScalar, scalarText, walk } from "../../utils/tree.js";
import { STATIC_CREDENTIAL_INPUTS, STATIC_CREDENTIAL_NAME, match } from "./shared.js";
import { labeledBlocks, terraformResources } from "./terraform.js";

export const staticCloudCredentials: RulePredicate = (document) => {
  const matches: RuleMatch[] = [];

  walk(document.root, (node) => {
    if (!isMapping(node)) {
      return;
    }

    // Azure variable lists: `- name: AWS_SECRET_ACCESS_KEY` / `value: ...`
    const listedName = scalarText(child(node, "name"));
    if (listedName && hasKey(node, "value") && STATIC_CREDENTIAL_NAME.test(listedName)) {
      matches.push(
        match(node, `Static credential "${listedName}" is defined as a pipeline variable; use workload identity federation instead`),
      );
    }

    for (const entry of node.entries) {
      if (!isScalar(entry.value) || entry.value.value === null) {
        continue;
      }
      if (STATIC_CREDENTIAL_NAME.test(entry.key)) {
        matches.push(
          match(entry.value, `Static credential "${entry.key}" is injected into the pipeline; exchange an OIDC token for short-lived credentials instead`),
        );
      } else if (STATIC_CREDENTIAL_INPUTS.has(entry.key)) {
        matches.push(
          match(entry.value, `Action input "${entry.key}" passes a long-lived key; configure OIDC federation instead`),
        );
      }
    }
  });

  return matches;
};

const PROVIDER_KEY_ATTRIBUTES = ["access_key", "secret_key", "client_secret", "client_certificate_password", "credentials"];

const LONG_LIVED_KEY_RESOURCES = [
  "aws_iam_access_key",
  "google_service_account_key",
  "azuread_application_password",
  "azuread_service_principal_password",
];

export const terraformStaticKeys: RulePredicate = (document) => {
  const matches: RuleMatch[] = [];

  for (const provider of labeledBlocks(document.root, "provider")) {
    for (const attribute of PROVIDER_KEY_ATTRIBUTES) {
      const value = child(provider.body, attribute);
      if (value) {
        matches.push(
          match(value, `Provider "${provider.name}" authenticates with static "${attribute}"; use OIDC or an assumed role`),
        );
      }
    }
  }

  for (const resource of terraformResources(document.root, LONG_LIVED_KEY_RESOURCES)) {
    matches.push(
      match(resource.body, `${resource.type}.${resource.name} mints a long-lived credential`),
    );
  }

  return matches;
};
