import { randomUUID } from "node:crypto";
import { copyFile, mkdir, readFile } from "node:fs/promises";
import { basename, extname, join, resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { getConfig } from "../config.js";
import { ConfigError, errorMessage } from "../errors.js";
import { log } from "../utils/logger.js";
import type { ArtifactMetadata, ArtifactStore } from "./types.js";

const CONTENT_TYPES: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".svg": "image/svg+xml",
};

export function contentTypeFor(file: string): string {
  return CONTENT_TYPES[extname(file).toLowerCase()] ?? "application/octet-stream";
}

/** Collision-free object name that keeps the original extension. */
function objectName(file: string): string {
  return `${randomUUID()}${extname(file).toLowerCase()}`;
}

export type SupabaseArtifactStoreOptions = {
  url: string;
  key: string;
  /** Storage bucket (default: config storage.bucket) */
  bucket?: string;
  /** Table that receives one metadata row per upload; null disables it (default: config storage.metadataTable) */
  metadataTable?: string | null;
  /** Timeout in ms (default: 60000) */
  timeout?: number;
};

/** Uploads to Supabase Storage over its REST API and returns the public URL. */
export class SupabaseArtifactStore implements ArtifactStore {
  readonly name = "supabase";

  private url: string;
  private key: string;
  private bucket: string;
  private metadataTable: string | null;
  private timeout: number;

  constructor(opts: SupabaseArtifactStoreOptions) {
    const config = getConfig().storage;
    this.url = opts.url.replace(/\/+$/, "");
    this.key = opts.key;
    this.bucket = opts.bucket ?? config.bucket;
    this.metadataTable = opts.metadataTable === undefined ? config.metadataTable : opts.metadataTable;
    this.timeout = opts.timeout ?? 60_000;
  }

  static fromEnv(env: NodeJS.ProcessEnv = process.env): SupabaseArtifactStore {
    const url = env.SUPABASE_URL;
    const key = env.SUPABASE_KEY;
    if (!url || !key) throw new ConfigError("SUPABASE_URL and SUPABASE_KEY must both be set");
    return new SupabaseArtifactStore({ url, key });
  }

  publicUrl(name: string): string {
    return `${this.url}/storage/v1/object/public/${this.bucket}/${name}`;
  }

  async upload(filePath: string, metadata: ArtifactMetadata = {}): Promise<string> {
    const name = objectName(filePath);
    const body = await readFile(filePath);

    const res = await fetch(`${this.url}/storage/v1/object/${this.bucket}/${name}`, {
      method: "POST",
      headers: {
        ...this.authHeaders(),
        "Content-Type": contentTypeFor(filePath),
        "x-upsert": "true",
      },
      body,
      signal: AbortSignal.timeout(this.timeout),
    });
    if (!res.ok) {
      const text = await res.text();
      throw new Error(`Upload of ${basename(filePath)} failed: HTTP ${res.status}: ${text.slice(0, 200)}`);
    }

    const url = this.publicUrl(name);
    if (this.metadataTable) {
      await this.insertMetadata(name, url, metadata);
    }
    log.debug("[supabase] Uploaded artifact", { name, bucket: this.bucket });
    return url;
  }

  private async insertMetadata(name: string, url: string, metadata: ArtifactMetadata): Promise<void> {
    const res = await fetch(`${this.url}/rest/v1/${this.metadataTable}`, {
      method: "POST",
      headers: {
        ...this.authHeaders(),
        "Content-Type": "application/json",
        Prefer: "return=minimal",
      },
      body: JSON.stringify({ file_name: name, url, metadata, created_at: new Date().toISOString() }),
      signal: AbortSignal.timeout(this.timeout),
    });
    if (!res.ok) {
      const text = await res.text();
      throw new Error(`Metadata insert for ${name} failed: HTTP ${res.status}: ${text.slice(0, 200)}`);
    }
  }

  private authHeaders(): Record<string, string> {
    return { apikey: this.key, Authorization: `Bearer ${this.key}` };
  }
}

/** Copies artifacts into a local directory and returns file:// URLs. */
export class LocalArtifactStore implements ArtifactStore {
  readonly name = "local";
  readonly dir: string;

  constructor(dir: string) {
    this.dir = resolve(dir);
  }

  async upload(filePath: string, metadata: ArtifactMetadata = {}): Promise<string> {
    await mkdir(this.dir, { recursive: true });
    const dest = join(this.dir, objectName(filePath));
    try {
      await copyFile(filePath, dest);
    } catch (err) {
      throw new Error(`Could not store ${basename(filePath)}: ${errorMessage(err)}`, { cause: err });
    }
    log.debug("[local] Stored artifact", { dest, ...metadata });
    return pathToFileURL(dest).href;
  }
}
