import type { RuleMatch, ScalarNode, TreeNode } from "../types.js";
import { scalarText } from "../../utils/tree.js";

export function match(node: TreeNode, message: string): RuleMatch {
  return { node, message };
}

/** Variable names that conventionally hold long-lived credentials. */
export const STATIC_CREDENTIAL_NAME =
  /(^|_)(AWS_ACCESS_KEY_ID|AWS_SECRET_ACCESS_KEY|AZURE_CLIENT_SECRET|ARM_CLIENT_SECRET|ARM_ACCESS_KEY|GOOGLE_CREDENTIALS|GOOGLE_APPLICATION_CREDENTIALS_JSON|GCP_SA_KEY|GCP_SERVICE_ACCOUNT_KEY|SERVICE_ACCOUNT_KEY|DO_TOKEN|DIGITALOCEAN_ACCESS_TOKEN)$|(ACCESS_KEY|SECRET_KEY|CLIENT_SECRET)$/i;

/** Action inputs that take a static cloud key instead of an OIDC exchange. */
export const STATIC_CREDENTIAL_INPUTS = new Set([
  "aws-access-key-id",
  "aws-secret-access-key",
  "creds",
  "credentials_json",
  "client-secret",
]);

export const SECRET_NAME = /(secret|passw(or)?d|passwd|token|api[_-]?key|private[_-]?key|access[_-]?key|credential)/i;

const REFERENCE_VALUE =
  /(\$\{\{|\$\(|\$\{|^\$[A-Za-z_]|\bsecrets\.|\bvars\.|\bvar\.|\blocal\.|\bdata\.|vault:|^!reference|^\*)/;

const PLACEHOLDER_VALUE = /^(<[^>]*>|changeme|change-me|todo|xxx+|\*+|true|false|none|null|required|optional)$/i;

const PATH_OR_URL = /^(\/|\.{1,2}\/|~\/|[a-z][a-z0-9+.-]*:\/\/)/i;

/**
 * A literal that looks like an embedded credential: long enough to matter, and not a
 * reference to a secret store or variable, a path, a URL or an obvious placeholder.
 */
export function isLiteralSecret(value: string): boolean {
  const trimmed = value.trim();
  if (trimmed.length < 8 || /\s/.test(trimmed)) {
    return false;
  }
  if (REFERENCE_VALUE.test(trimmed) || PLACEHOLDER_VALUE.test(trimmed) || PATH_OR_URL.test(trimmed)) {
    return false;
  }
  return true;
}

export const PRIVATE_KEY_MARKER = /-----BEGIN ([A-Z]+ )?PRIVATE KEY-----/;

export interface ImageParts {
  name: string;
  tag?: string;
  digest?: string;
}

/** Splits `registry:5000/name:tag@sha256:...` into name, tag and digest. */
export function parseImageReference(reference: string): ImageParts {
  let rest = reference.trim().replace(/^docker:\/\//, "");
  let digest: string | undefined;
  const at = rest.indexOf("@");
  if (at !== -1) {
    digest = rest.slice(at + 1);
    rest = rest.slice(0, at);
  }
  const slash = rest.lastIndexOf("/");
  const colon = rest.lastIndexOf(":");
  if (colon > slash) {
    return { name: rest.slice(0, colon), tag: rest.slice(colon + 1), digest };
  }
  return { name: rest, digest };
}

export function isDigestPinned(reference: string): boolean {
  const digest = parseImageReference(reference).digest;
  return digest !== undefined && /^sha256:[a-f0-9]{64}$/i.test(digest);
}

export function isExpression(value: string): boolean {
  return /\$\{\{|\$\(|\$\{|^\$[A-Za-z_]/.test(value);
}

export function textOf(node: ScalarNode | undefined): string {
  return scalarText(node) ?? "";
}

export const FULL_COMMIT_SHA = /^[a-f0-9]{40}$/i;
export const VERSION_TAG = /^v?\d+(\.\d+)*([-+.][0-9A-Za-z.-]+)?$/;
