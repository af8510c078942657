import { PreviewOptions, loadPreviewConfig } from "../config/preview.config.js";
import { CleanupResult } from "../controllers/environment.controller.js";
import { HandlerDependencies, defaultDependencies } from "./handler.types.js";

export const handler = async (
  options: PreviewOptions,
  dependencies: HandlerDependencies = defaultDependencies
): Promise<CleanupResult> => {
  const config = loadPreviewConfig(options, dependencies.env);
  const result = await dependencies.createController(config).cleanup();

  dependencies.print(`Cleanup completed successfully for ${result.hostname}`);
  for (const warning of result.warnings) {
    dependencies.print(`Warning: ${warning}`);
  }

  return result;
};
