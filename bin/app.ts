#!/usr/bin/env node
import "source-map-support/register";
import { Command } from "commander";

import { handler as deployHandler } from "../src/preview/handlers/deploy.handler.js";
import { handler as cleanupHandler } from "../src/preview/handlers/cleanup.handler.js";
import { PreviewOptions } from "../src/preview/config/preview.config.js";
import { isWaitTimeout } from "../src/preview/errors/WaitTimeoutError.js";
import { errorMessage, logger } from "../src/preview/utils/logger.utils.js";

const program = new Command();

program
  .name("pr-preview")
  .description(
    "Provision and tear down per-pull-request static site previews on S3, CloudFront and Route 53"
  );

const withCommonOptions = (command: Command): Command =>
  command
    .option("--pr <number>", "Pull request number")
    .option("--app <name>", "Application name")
    .option("--region <region>", "AWS region", "us-east-1")
    .option("--domain <domain>", "Base domain (e.g., preview.yourapp.com)")
    .option("--repo-owner <owner>", "GitHub repository owner")
    .option("--repo-name <name>", "GitHub repository name");

withCommonOptions(program.command("deploy"))
  .description("Create or update the preview environment")
  .option("--source <dir>", "Source directory to upload", "./dist")
  .option("--cert <arn>", "ACM certificate ARN for the preview hostname")
  .action(async (options: PreviewOptions) => {
    await deployHandler(options);
  });

withCommonOptions(program.command("cleanup"))
  .description("Remove every resource of the preview environment")
  .action(async (options: PreviewOptions) => {
    await cleanupHandler(options);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error("Preview command failed", { error: errorMessage(error) });
  console.error(errorMessage(error));
  process.exitCode = isWaitTimeout(error) ? 2 : 1;
});
