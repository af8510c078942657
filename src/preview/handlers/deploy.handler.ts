import { PreviewOptions, loadPreviewConfig } from "../config/preview.config.js";
import { DeployResult } from "../controllers/environment.controller.js";
import { HandlerDependencies, defaultDependencies } from "./handler.types.js";

export const handler = async (
  options: PreviewOptions,
  dependencies: HandlerDependencies = defaultDependencies
): Promise<DeployResult> => {
  const config = loadPreviewConfig(options, dependencies.env);
  const result = await dependencies.createController(config).deploy();

  dependencies.print("");
  dependencies.print("✓ Preview environment deployed successfully!");
  dependencies.print(`URL: ${result.url}`);
  dependencies.print(`Files uploaded: ${result.fileCount}`);
  dependencies.print(
    "Note: Initial deployment may take 3-5 minutes for CloudFront to propagate globally."
  );

  return result;
};
