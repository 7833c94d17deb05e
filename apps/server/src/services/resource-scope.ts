import { readdir, rm } from "node:fs/promises";
import { join } from "node:path";
import { createLogger } from "../lib/logger.js";
import type { AudioSource, ResolvedAudio, SourceResolver } from "./audio-resolver.js";

const logger = createLogger("janitor");

/**
 * Tracks the files a request resolves and cleans them up when it closes:
 * owned scratch files are deleted, cache leases are released.
 * Anything adopted after close() is cleaned up right away.
 */
export class ResourceScope {
  private readonly resources: ResolvedAudio[] = [];
  private closed = false;

  async resolve(resolver: SourceResolver, source: AudioSource): Promise<ResolvedAudio> {
    const resolved = await resolver.resolve(source);
    await this.adopt(resolved);
    return resolved;
  }

  async adopt(resource: ResolvedAudio): Promise<void> {
    if (this.closed) {
      logger.warn(`resource adopted after close, cleaning up ${resource.path}`);
      await cleanup(resource);
      return;
    }
    this.resources.push(resource);
  }

  get size(): number {
    return this.resources.length;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const resources = this.resources.splice(0).reverse();
    await Promise.all(resources.map(cleanup));
  }
}

/** Runs `fn` with a fresh scope that is closed on every exit path. */
export async function withResourceScope<T>(fn: (scope: ResourceScope) => Promise<T>): Promise<T> {
  const scope = new ResourceScope();
  try {
    return await fn(scope);
  } finally {
    await scope.close();
  }
}

/**
 * Deletes scratch files left behind by a previous process. Call before the
 * server accepts requests.
 */
export async function purgeScratchDirectory(scratchDir: string): Promise<number> {
  let names: string[];
  try {
    names = await readdir(scratchDir);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return 0;
    throw err;
  }
  await Promise.all(names.map((name) => rm(join(scratchDir, name), { recursive: true, force: true })));
  if (names.length > 0) {
    logger.info(`removed ${names.length} stale scratch file(s) from ${scratchDir}`);
  }
  return names.length;
}

// Cleanup failures are logged, not thrown: they must not replace the
// request's own outcome.
async function cleanup(resource: ResolvedAudio): Promise<void> {
  resource.release?.();
  if (!resource.owned) return;
  try {
    await rm(resource.path, { force: true });
  } catch (err) {
    logger.error(`failed to remove ${resource.path}`, err);
  }
}
