/**
 * GitHub integration — read/write the catalog file via the GitHub Contents API.
 *
 * The catalog repository acts as the database: courses and their embeddings
 * live in one JSON file committed by the ingestion tooling and by the
 * catalog-maintenance endpoint.
 */

import {
  type CatalogFile,
  type CatalogRecord,
  type CourseId,
  emptyCatalogFile,
} from "@/types";
import {
  CATALOG_PATH,
  GITHUB_API_BASE,
  getCatalogOwner,
  getCatalogRepo,
  getGitHubToken,
} from "./config";
import { logEvent } from "./log";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when GitHub returns 409 Conflict, meaning the SHA provided to a PUT
 * was stale — another write happened between the read and write.
 */
export class GitHubConflictError extends Error {
  constructor(path: string) {
    super(`GitHub conflict (stale SHA) for ${path}`);
    this.name = "GitHubConflictError";
  }
}

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Result of reading a file from the GitHub Contents API. */
export interface GitHubFile {
  /** Decoded UTF-8 content of the file. */
  content: string;
  /** The blob SHA, required when updating an existing file. */
  sha: string;
}

/** Options for writing a file to the catalog repository. */
export interface WriteFileOptions {
  /** Repo-relative file path (e.g. "index/catalog.json"). */
  path: string;
  /** UTF-8 content to write. */
  content: string;
  /** Commit message. */
  message: string;
  /** SHA of the existing file (required for updates, omit for creation). */
  sha?: string;
}

// ---------------------------------------------------------------------------
// Low-level helpers
// ---------------------------------------------------------------------------

function contentsUrl(path: string): string {
  return `${GITHUB_API_BASE}/repos/${getCatalogOwner()}/${getCatalogRepo()}/contents/${path}`;
}

function headers(): Record<string, string> {
  return {
    Authorization: `Bearer ${getGitHubToken()}`,
    Accept: "application/vnd.github.v3+json",
    "Content-Type": "application/json",
  };
}

/**
 * Read a file from the catalog repository.
 *
 * Returns the decoded content and SHA, or `null` if the file does not exist
 * (HTTP 404), so an empty repository bootstraps to an empty catalog.
 */
export async function readFile(path: string): Promise<GitHubFile | null> {
  const response = await fetch(contentsUrl(path), {
    method: "GET",
    headers: headers(),
  });

  if (response.status === 404) {
    return null;
  }

  if (!response.ok) {
    const body = await response.text();
    throw new Error(
      `GitHub read failed for ${path} (${response.status}): ${body}`,
    );
  }

  const json = (await response.json()) as {
    content: string;
    sha: string;
    encoding: string;
  };

  if (json.encoding !== "base64") {
    throw new Error(`Unexpected encoding for ${path}: ${json.encoding}`);
  }

  const content = Buffer.from(json.content, "base64").toString("utf-8");
  return { content, sha: json.sha };
}

/**
 * Write (create or update) a file in the catalog repository.
 *
 * Returns the new blob SHA after the commit. Throws GitHubConflictError
 * when `sha` is stale.
 */
export async function writeFile(options: WriteFileOptions): Promise<string> {
  const body: Record<string, string> = {
    message: options.message,
    content: Buffer.from(options.content, "utf-8").toString("base64"),
  };

  if (options.sha) {
    body.sha = options.sha;
  }

  const response = await fetch(contentsUrl(options.path), {
    method: "PUT",
    headers: headers(),
    body: JSON.stringify(body),
  });

  if (!response.ok) {
    if (response.status === 409) {
      throw new GitHubConflictError(options.path);
    }
    const text = await response.text();
    throw new Error(
      `GitHub write failed for ${options.path} (${response.status}): ${text}`,
    );
  }

  const json = (await response.json()) as { content: { sha: string } };
  return json.content.sha;
}

// ---------------------------------------------------------------------------
// Catalog file
// ---------------------------------------------------------------------------

/**
 * Read the raw catalog file. Returns an empty catalog if the file does not
 * yet exist. The content is parsed but not validated; see `parseCatalogFile`.
 */
export async function readCatalogFile(): Promise<{ data: unknown; sha: string | null }> {
  const file = await readFile(CATALOG_PATH);
  if (!file) {
    return { data: emptyCatalogFile(), sha: null };
  }
  const data: unknown = JSON.parse(file.content);
  return { data, sha: file.sha };
}

const MAX_UPDATE_ATTEMPTS = 5;

/**
 * Atomically read-mutate-write a JSON file with optimistic concurrency.
 *
 * Re-fetches the file before every write attempt, then retries on
 * 409 Conflict. Non-conflict errors (auth, network, 5xx) are rethrown
 * immediately without retrying.
 *
 * @param path    - Repo-relative path to the JSON file.
 * @param empty   - Factory that returns an empty document when the file does not yet exist.
 * @param mutate  - Applies the desired change to the parsed document in place.
 * @param message - Git commit message used for the write.
 */
export async function updateJsonFileWithRetry<T>(
  path: string,
  empty: () => T,
  mutate: (doc: T) => void,
  message: string,
): Promise<void> {
  for (let attempt = 1; attempt <= MAX_UPDATE_ATTEMPTS; attempt++) {
    const file = await readFile(path);
    const doc: T = file ? (JSON.parse(file.content) as T) : empty();

    mutate(doc);

    try {
      logEvent("catalog_update_attempt", { attempt, path });
      await writeFile({
        path,
        content: JSON.stringify(doc, null, 2) + "\n",
        message,
        sha: file?.sha,
      });
      logEvent("catalog_update_success", { attempt, path });
      return;
    } catch (err) {
      if (!(err instanceof GitHubConflictError)) {
        throw err;
      }
      if (attempt < MAX_UPDATE_ATTEMPTS) {
        const delayMs = 50 + Math.floor(Math.random() * 100);
        logEvent("catalog_update_conflict", { attempt, path, retryAfterMs: delayMs });
        await new Promise<void>((resolve) => setTimeout(resolve, delayMs));
      }
    }
  }

  throw new Error(
    `Failed to update "${path}" after ${MAX_UPDATE_ATTEMPTS} attempts`,
  );
}

/**
 * Write one course record into the catalog file, establishing the catalog
 * dimension on the first write.
 */
export async function upsertCatalogRecordWithRetry(
  courseId: CourseId,
  record: CatalogRecord,
  message: string = `Update catalog: upsert ${courseId}`,
): Promise<void> {
  return updateJsonFileWithRetry<CatalogFile>(
    CATALOG_PATH,
    emptyCatalogFile,
    (catalog) => {
      catalog.dimension ??= record.vector.length;
      catalog.courses[courseId] = record;
    },
    message,
  );
}
