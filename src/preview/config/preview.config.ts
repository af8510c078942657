import { ConfigurationError } from "../errors/ConfigurationError.js";
import { DEFAULT_GITHUB_API_URL } from "../clients/github.client.js";

/**
 * Raw options as they come off the command line.
 */
export type PreviewOptions = Readonly<{
  pr?: string;
  app?: string;
  region?: string;
  domain?: string;
  source?: string;
  cert?: string;
  repoOwner?: string;
  repoName?: string;
}>;

export type PreviewConfig = Readonly<{
  environmentKey: number;
  appName: string;
  region: string;
  baseDomain: string;
  sourceDir: string;
  certificateArn?: string;
  repoOwner: string;
  repoName: string;
  githubToken?: string;
  githubApiUrl: string;
}>;

export const DEFAULT_REGION = "us-east-1";
export const DEFAULT_SOURCE_DIR = "./dist";

export function loadPreviewConfig(
  options: PreviewOptions,
  env: NodeJS.ProcessEnv = process.env
): PreviewConfig {
  const prNumber = Number(options.pr?.trim());
  if (!options.pr?.trim() || !Number.isSafeInteger(prNumber) || prNumber <= 0) {
    throw new ConfigurationError("PR number is required (--pr)");
  }

  const appName = required(options.app, "App name is required (--app)");
  const baseDomain = required(
    options.domain,
    "Base domain is required (--domain)"
  );
  const repoOwner = required(
    options.repoOwner,
    "Repository owner is required (--repo-owner)"
  );
  const repoName = required(
    options.repoName,
    "Repository name is required (--repo-name)"
  );

  return Object.freeze({
    environmentKey: prNumber,
    appName,
    region: options.region?.trim() || DEFAULT_REGION,
    baseDomain,
    sourceDir: options.source?.trim() || DEFAULT_SOURCE_DIR,
    certificateArn: options.cert?.trim() || undefined,
    repoOwner,
    repoName,
    githubToken: env.GITHUB_TOKEN?.trim() || undefined,
    githubApiUrl: env.GITHUB_API_URL?.trim() || DEFAULT_GITHUB_API_URL,
  });
}

function required(value: string | undefined, message: string): string {
  const trimmed = value?.trim();
  if (!trimmed) {
    throw new ConfigurationError(message);
  }
  return trimmed;
}
