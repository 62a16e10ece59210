/**
 * Story repository: markdown files in one flat directory.
 *
 * A story is addressed by the filename derived from its title. Saving a
 * title that derives to an existing filename replaces that file; there is
 * no versioning and no locking, so concurrent saves are last-writer-wins.
 *
 * File layout:
 *
 *   # <title>
 *
 *   **Date Created:** <Month DD, YYYY>
 *
 *   <content, verbatim>
 */

import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { NotFoundError, StorageError, ValidationError, isErrnoException } from "./errors.js";
import type { Logger } from "../runtime/logger.js";
import type { StoredLocation } from "./types.js";

export const STORY_EXTENSION = ".md";

const MONTHS = [
  "January", "February", "March", "April", "May", "June",
  "July", "August", "September", "October", "November", "December",
];

// ── Pure helpers ─────────────────────────────────────────────

/**
 * Filename for a title: lowercase, apostrophes dropped, every run of
 * non-alphanumerics collapsed to `_`, outer underscores trimmed.
 *
 *   "Jack's Night Run!"      → "jacks_night_run.md"
 *   "  Multiple   Spaces  "  → "multiple_spaces.md"
 */
export function deriveFilename(title: string): string {
  const slug = title
    .toLowerCase()
    .replace(/['’]/g, "")
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
  if (!slug) {
    throw new ValidationError(`Title must contain at least one letter or digit: ${JSON.stringify(title)}`);
  }
  return slug + STORY_EXTENSION;
}

/** `October 05, 2026`, in local time. */
export function formatStoryDate(date: Date): string {
  const day = String(date.getDate()).padStart(2, "0");
  return `${MONTHS[date.getMonth()]} ${day}, ${date.getFullYear()}`;
}

export function renderStoryFile(title: string, content: string, createdAt: Date): string {
  return `# ${title}\n\n**Date Created:** ${formatStoryDate(createdAt)}\n\n${content}`;
}

function assertSafeFilename(filename: string): void {
  if (!filename.trim()) {
    throw new ValidationError("Filename must not be empty");
  }
  if (
    filename.includes("\0") ||
    filename.includes("/") ||
    filename.includes("\\") ||
    filename === "." ||
    filename === ".." ||
    path.isAbsolute(filename)
  ) {
    throw new ValidationError(`Invalid story filename (must be a plain file name): ${filename}`);
  }
}

// ── Repository ───────────────────────────────────────────────

export interface StoryRepositoryOptions {
  directory: string;
  logger?: Logger;
  /** Clock used for the `Date Created` line. */
  now?: () => Date;
}

export class StoryRepository {
  readonly directory: string;
  private readonly logger?: Logger;
  private readonly now: () => Date;

  constructor(options: StoryRepositoryOptions) {
    this.directory = path.resolve(options.directory);
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  async saveStory(title: string, content: string): Promise<StoredLocation> {
    const trimmedTitle = title.trim();
    if (!trimmedTitle) throw new ValidationError("Story title must not be empty");
    if (!content.trim()) throw new ValidationError(`Story content must not be empty (title: ${trimmedTitle})`);

    const filename = deriveFilename(trimmedTitle);
    const filePath = path.join(this.directory, filename);
    this.logger?.info(`Saving story '${trimmedTitle}' to file: ${filename}`);

    try {
      await fs.mkdir(this.directory, { recursive: true });
    } catch (err) {
      this.logger?.error(`Failed to create story directory for '${trimmedTitle}'`, err);
      throw new StorageError("create directory", this.directory, err);
    }

    try {
      await fs.writeFile(filePath, renderStoryFile(trimmedTitle, content, this.now()), "utf-8");
    } catch (err) {
      this.logger?.error(`Failed to save story '${trimmedTitle}'`, err);
      throw new StorageError("write", filePath, err);
    }

    this.logger?.info(`Successfully saved story to: ${filePath}`);
    return { filename, path: filePath };
  }

  /** Story filenames, sorted ascending. `reason` is only logged. */
  async listStories(reason: string): Promise<string[]> {
    this.logger?.info(`Listing story files - reason: ${reason}`);

    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.directory, { withFileTypes: true });
    } catch (err) {
      if (isErrnoException(err, "ENOENT")) {
        this.logger?.info("Story directory does not exist yet; no stories");
        return [];
      }
      this.logger?.error("Failed to list story files", err);
      throw new StorageError("list", this.directory, err);
    }

    const files = entries
      .filter((e) => e.isFile() && e.name.endsWith(STORY_EXTENSION))
      .map((e) => e.name)
      .sort();
    this.logger?.info(`Found ${files.length} story files`, files);
    return files;
  }

  async getStory(filename: string): Promise<string> {
    this.logger?.info(`Reading story file: ${filename}`);
    assertSafeFilename(filename);

    const filePath = path.resolve(this.directory, filename);
    if (path.dirname(filePath) !== this.directory) {
      throw new ValidationError(`Invalid story filename (outside the story directory): ${filename}`);
    }
    if (!filename.endsWith(STORY_EXTENSION)) {
      throw new NotFoundError(`Story file not found: ${filename}`);
    }

    let content: string;
    try {
      // lstat: symlinks are not stories, same as in listStories
      const stat = await fs.lstat(filePath);
      if (!stat.isFile()) throw new NotFoundError(`Story file not found: ${filename}`);
      content = await fs.readFile(filePath, "utf-8");
    } catch (err) {
      if (err instanceof NotFoundError) throw err;
      if (isErrnoException(err, "ENOENT")) {
        this.logger?.warn(`Story file not found: ${filename}`);
        throw new NotFoundError(`Story file not found: ${filename}`);
      }
      this.logger?.error(`Failed to read story file '${filename}'`, err);
      throw new StorageError("read", filePath, err);
    }

    this.logger?.info(`Successfully read story file: ${filename} (${content.length} characters)`);
    return content;
  }
}
