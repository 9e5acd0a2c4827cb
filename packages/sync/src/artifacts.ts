/**
 * Sync Package - Artifact Stores
 *
 * Where generated view files are read from and written to. Paths are the
 * artifact paths the service derives (`<outputDir>/<ClassName>.ts`).
 */

import fs from "node:fs";
import path from "node:path";

export interface ArtifactStore {
  /** Current text, or undefined when the artifact does not exist */
  read(artifactPath: string): string | undefined;
  write(artifactPath: string, text: string): void;
}

/** In-memory artifacts (per session). */
export class MemoryArtifactStore implements ArtifactStore {
  #files = new Map<string, string>();

  read(artifactPath: string): string | undefined {
    return this.#files.get(artifactPath);
  }

  write(artifactPath: string, text: string): void {
    this.#files.set(artifactPath, text);
  }

  /** Stored paths, in write order */
  paths(): string[] {
    return [...this.#files.keys()];
  }
}

/** Artifacts on disk, relative to a project root. */
export class FsArtifactStore implements ArtifactStore {
  #root: string;
  constructor(root: string) {
    this.#root = root;
  }

  read(artifactPath: string): string | undefined {
    const file = this.#pathFor(artifactPath);
    if (!fs.existsSync(file)) return undefined;
    return fs.readFileSync(file, "utf8");
  }

  write(artifactPath: string, text: string): void {
    const file = this.#pathFor(artifactPath);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, text, "utf8");
  }

  #pathFor(artifactPath: string): string {
    return path.resolve(this.#root, artifactPath);
  }
}
