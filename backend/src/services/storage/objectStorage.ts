/**
 * Object storage for submission attachments (Supabase Storage REST API).
 * Disabled when STORAGE_URL / STORAGE_SERVICE_KEY are not configured.
 */

import type { Env } from "../../config/env";

export interface ObjectStorage {
  /** Upload bytes; returns the public URL of the object. */
  put(bytes: Uint8Array, destinationPath: string, contentType: string): Promise<string>;
  /** Temporary signed URL for a stored object. */
  sign(objectPath: string, ttlSeconds: number): Promise<string>;
}

export type SupabaseStorageConfig = {
  url: string;
  serviceKey: string;
  bucket: string;
};

export class StorageRequestError extends Error {
  constructor(
    public readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "StorageRequestError";
  }
}

function encodePath(objectPath: string): string {
  return objectPath.split("/").map(encodeURIComponent).join("/");
}

export class SupabaseStorage implements ObjectStorage {
  private readonly baseUrl: string;

  constructor(
    private readonly config: SupabaseStorageConfig,
    private readonly fetchImpl: typeof fetch = fetch
  ) {
    this.baseUrl = config.url.replace(/\/$/, "");
  }

  async put(bytes: Uint8Array, destinationPath: string, contentType: string): Promise<string> {
    const path = encodePath(destinationPath);
    const res = await this.fetchImpl(`${this.baseUrl}/storage/v1/object/${this.config.bucket}/${path}`, {
      method: "PUT",
      headers: {
        Authorization: `Bearer ${this.config.serviceKey}`,
        "Content-Type": contentType
      },
      body: bytes
    });
    if (!res.ok) {
      throw new StorageRequestError(res.status, `Upload failed with status ${res.status}`);
    }
    return `${this.baseUrl}/storage/v1/object/public/${this.config.bucket}/${path}`;
  }

  async sign(objectPath: string, ttlSeconds: number): Promise<string> {
    const path = encodePath(objectPath);
    const res = await this.fetchImpl(`${this.baseUrl}/storage/v1/object/sign/${this.config.bucket}/${path}`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.config.serviceKey}`,
        "Content-Type": "application/json"
      },
      body: JSON.stringify({ expiresIn: Math.floor(ttlSeconds) })
    });
    if (!res.ok) {
      throw new StorageRequestError(res.status, `Signing failed with status ${res.status}`);
    }
    const data: unknown = await res.json();
    const signed =
      typeof data === "object" && data !== null
        ? ("signedURL" in data ? data.signedURL : "signed_url" in data ? data.signed_url : undefined)
        : undefined;
    if (typeof signed !== "string" || !signed) {
      throw new StorageRequestError(res.status, "Signing response had no signed URL");
    }
    return signed.startsWith("http") ? signed : `${this.baseUrl}/storage/v1${signed}`;
  }
}

export function createObjectStorage(env: Env): ObjectStorage | null {
  if (!env.STORAGE_URL || !env.STORAGE_SERVICE_KEY) return null;
  return new SupabaseStorage({
    url: env.STORAGE_URL,
    serviceKey: env.STORAGE_SERVICE_KEY,
    bucket: env.STORAGE_BUCKET
  });
}
