import { ConfigurationError } from "../errors/ConfigurationError.js";

export type EnvironmentIdentity = Readonly<{
  key: number;
  appName: string;
  baseDomain: string;
  bucketName: string;
  hostname: string;
  originAccessControlName: string;
}>;

const BUCKET_NAME_PATTERN = /^[a-z0-9][a-z0-9-]{1,61}[a-z0-9]$/;

/**
 * Derives every resource name of a preview environment from its key and app.
 * The same inputs always address the same bucket, alias and access control.
 * @param key pull request number
 */
export function deriveEnvironmentIdentity(
  key: number,
  appName: string,
  baseDomain: string
): EnvironmentIdentity {
  if (!Number.isSafeInteger(key) || key <= 0) {
    throw new ConfigurationError(
      `Environment key must be a positive integer, got ${key}`
    );
  }

  const app = appName.trim().toLowerCase();
  const domain = baseDomain.trim().toLowerCase().replace(/\.$/, "");
  const bucketName = `pr-${key}-${app}`;

  if (!BUCKET_NAME_PATTERN.test(bucketName)) {
    throw new ConfigurationError(
      `App name "${appName}" does not produce a valid bucket name (${bucketName})`
    );
  }

  return {
    key,
    appName: app,
    baseDomain: domain,
    bucketName,
    hostname: `${bucketName}.${domain}`,
    originAccessControlName: `OAC-${bucketName}`,
  };
}
