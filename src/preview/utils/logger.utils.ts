import { Logger } from "@aws-lambda-powertools/logger";

export const logger = new Logger({ serviceName: "pr-preview" });

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
