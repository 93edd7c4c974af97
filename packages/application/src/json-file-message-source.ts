import { readFile } from "node:fs/promises";
import path from "node:path";

import {
  formatZodIssues,
  messageCatalogFileSchema,
  type MessageCatalog,
} from "@msgroute/contracts";

import { InvalidMessageCatalogError } from "./errors.js";
import {
  BaseMessageSource,
  type BaseMessageSourceOptions,
} from "./message-source.js";

export interface JsonFileMessageSourceOptions extends BaseMessageSourceOptions {
  basePath: string;
  /** category -> file relative to `<basePath>/<language>/` */
  fileMap?: Record<string, string>;
}

function isInsideDirectory(directory: string, target: string): boolean {
  const relative = path.relative(directory, target);
  return (
    relative !== "" &&
    relative.split(path.sep)[0] !== ".." &&
    !path.isAbsolute(relative)
  );
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Reads catalogs from `<basePath>/<language>/<category>.json`, one flat
 * JSON object of message -> translation per file. A missing file is an
 * empty catalog.
 */
export class JsonFileMessageSource extends BaseMessageSource {
  readonly basePath: string;
  private readonly fileMap: Record<string, string>;

  constructor(options: JsonFileMessageSourceOptions) {
    super(options);
    this.basePath = options.basePath;
    this.fileMap = options.fileMap ?? {};
  }

  resolveMessageFilePath(category: string, language: string): string {
    const mapped = Object.hasOwn(this.fileMap, category)
      ? this.fileMap[category]
      : undefined;
    const file = mapped ?? `${category.replace(/\\/g, "/")}.json`;
    const basePath = path.resolve(this.basePath);
    const languagePath = path.resolve(basePath, language);
    const filePath = path.resolve(languagePath, file);

    if (
      !isInsideDirectory(basePath, languagePath) ||
      !isInsideDirectory(languagePath, filePath)
    ) {
      throw new InvalidMessageCatalogError(
        `Message file for category '${category}' and language '${language}' is outside the catalog directory`,
        { category, language },
      );
    }

    return filePath;
  }

  protected async loadMessages(
    category: string,
    language: string,
  ): Promise<MessageCatalog> {
    const filePath = this.resolveMessageFilePath(category, language);

    let raw: string;
    try {
      raw = await readFile(filePath, "utf8");
    } catch (error) {
      if (isMissingFileError(error)) return {};
      throw error;
    }

    let content: unknown;
    try {
      content = JSON.parse(raw);
    } catch (error) {
      throw new InvalidMessageCatalogError(
        `Message file is not valid JSON: ${filePath}`,
        { filePath },
        error,
      );
    }

    const parsed = messageCatalogFileSchema.safeParse(content);
    if (!parsed.success) {
      throw new InvalidMessageCatalogError(
        `Message file must map messages to strings: ${filePath} - ${formatZodIssues(
          parsed.error.issues,
        )}`,
        { filePath },
      );
    }

    return parsed.data;
  }
}
