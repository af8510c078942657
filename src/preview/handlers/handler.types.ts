import { PreviewConfig } from "../config/preview.config.js";
import { EnvironmentController } from "../controllers/environment.controller.js";

export type HandlerDependencies = Readonly<{
  createController: (config: PreviewConfig) => EnvironmentController;
  print: (line: string) => void;
  env: NodeJS.ProcessEnv;
}>;

export const defaultDependencies: HandlerDependencies = {
  createController: (config) => EnvironmentController.fromConfig(config),
  print: (line) => console.log(line),
  env: process.env,
};
