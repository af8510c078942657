import { errorMessage } from "../utils/logger.utils.js";

export class UploadError extends Error {
  constructor(readonly key: string, cause: unknown) {
    super(`failed to upload ${key}: ${errorMessage(cause)}`, { cause });
    this.name = "UploadError";
  }
}
