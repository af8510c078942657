import { Logger } from "@aws-lambda-powertools/logger";
import { readFile, readdir, stat } from "fs/promises";
import path from "path";

import { S3Api } from "../clients/s3.client.js";
import { UploadError } from "../errors/UploadError.js";
import { getContentType } from "../utils/content-type.utils.js";
import { logger as defaultLogger } from "../utils/logger.utils.js";

export type ContentItem = Readonly<{
  key: string;
  body: Uint8Array;
  contentType: string;
}>;

export type ContentSyncServiceOptions = {
  s3: S3Api;
  logger?: Logger;
};

/**
 * Walks `sourceDir` depth-first in name order and yields one item per regular
 * file, keyed by its path relative to the root with `/` separators. Symbolic
 * links are followed to files; links to anything else are skipped with a
 * warning.
 */
export async function* walkContent(
  sourceDir: string,
  logger: Logger = defaultLogger,
  relativeDir: string = ""
): AsyncGenerator<ContentItem> {
  const entries = await readdir(path.join(sourceDir, relativeDir), {
    withFileTypes: true,
  });

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const relativePath = path.join(relativeDir, entry.name);
    const absolutePath = path.join(sourceDir, relativePath);

    if (entry.isDirectory()) {
      yield* walkContent(sourceDir, logger, relativePath);
      continue;
    }

    if (entry.isSymbolicLink() && !(await isLinkToFile(absolutePath))) {
      logger.warn("Skipping symbolic link that does not point to a file", {
        path: relativePath,
      });
      continue;
    }

    if (entry.isFile() || entry.isSymbolicLink()) {
      yield {
        key: relativePath.split(path.sep).join("/"),
        body: await readFile(absolutePath),
        contentType: getContentType(entry.name),
      };
    }
  }
}

async function isLinkToFile(linkPath: string): Promise<boolean> {
  try {
    return (await stat(linkPath)).isFile();
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") {
      return false;
    }
    throw e;
  }
}

export class ContentSyncService {
  private readonly s3: S3Api;
  private readonly logger: Logger;

  constructor(options: ContentSyncServiceOptions) {
    this.s3 = options.s3;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Uploads the whole tree. The first failed upload aborts the sync.
   * @returns number of files uploaded
   */
  async sync(sourceDir: string, bucket: string): Promise<number> {
    this.logger.info("Syncing files", { sourceDir, bucket });

    let fileCount = 0;
    for await (const item of walkContent(sourceDir, this.logger)) {
      try {
        await this.s3.putObject(bucket, item.key, item.body, item.contentType);
      } catch (e) {
        throw new UploadError(item.key, e);
      }
      this.logger.debug("Uploaded", { key: item.key, contentType: item.contentType });
      fileCount++;
    }

    this.logger.info("Files uploaded", { bucket, fileCount });
    return fileCount;
  }
}
