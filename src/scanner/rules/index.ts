import type { RulePredicate } from "../types.js";
import { deployWithoutApproval, unprotectedPushDeploy } from "./sec-1-flow-control.js";
import { staticCloudCredentials, terraformStaticKeys } from "./sec-2-identity.js";
import { installWithoutLockfile, remoteScriptPipe, unpinnedImage } from "./sec-3-dependencies.js";
import {
  privilegedEventSecrets,
  prTargetUntrustedCheckout,
  prWritePermissions,
  pullRequestSecrets,
} from "./sec-4-ppe.js";
import { broadPermissions, missingPermissions, persistedCheckoutCredentials } from "./sec-5-access-control.js";
import { hardcodedSecret, secretInCommand } from "./sec-6-credential-hygiene.js";
import { privilegedContainer, rootContainerUser } from "./sec-7-system-config.js";
import { mutableTemplateRef, unpinnedAction, unpinnedModule } from "./sec-8-third-party.js";
import { deployMutableTag, registryMutableTags, registryScanOnPush } from "./sec-9-artifact-integrity.js";
import { auditLoggingDisabled, noArtifactRetention } from "./sec-10-logging.js";

/** Maps a catalog `predicate_ref` to the code that implements it. */
export type PredicateRegistry = Readonly<Record<string, RulePredicate>>;

export const PREDICATES: PredicateRegistry = Object.freeze({
  "deploy-without-approval": deployWithoutApproval,
  "unprotected-push-deploy": unprotectedPushDeploy,
  "static-cloud-credentials": staticCloudCredentials,
  "terraform-static-keys": terraformStaticKeys,
  "unpinned-image": unpinnedImage,
  "install-without-lockfile": installWithoutLockfile,
  "remote-script-pipe": remoteScriptPipe,
  "pr-write-permissions": prWritePermissions,
  "pr-target-untrusted-checkout": prTargetUntrustedCheckout,
  "privileged-event-secrets": privilegedEventSecrets,
  "pr-secrets": pullRequestSecrets,
  "missing-permissions": missingPermissions,
  "broad-permissions": broadPermissions,
  "persisted-checkout-credentials": persistedCheckoutCredentials,
  "secret-in-command": secretInCommand,
  "hardcoded-secret": hardcodedSecret,
  "privileged-container": privilegedContainer,
  "root-container-user": rootContainerUser,
  "unpinned-action": unpinnedAction,
  "mutable-template-ref": mutableTemplateRef,
  "unpinned-module": unpinnedModule,
  "deploy-mutable-tag": deployMutableTag,
  "registry-mutable-tags": registryMutableTags,
  "registry-scan-on-push": registryScanOnPush,
  "no-artifact-retention": noArtifactRetention,
  "audit-logging-disabled": auditLoggingDisabled,
});

export const AVAILABLE_PREDICATE_REFS = Object.keys(PREDICATES);
