import fs from "fs";
import { promisify } from "util";
import { gunzip } from "zlib";
import { DatabaseSourceConfig } from "../models/geo-data";

const gunzipAsync = promisify(gunzip);

export type FetchLike = (
  url: string,
  init?: { signal?: AbortSignal }
) => Promise<{
  ok: boolean;
  status: number;
  statusText: string;
  arrayBuffer(): Promise<ArrayBuffer>;
}>;

export interface ReadOptions {
  fetchImpl?: FetchLike;
  timeoutMs?: number;
}

/**
 * Obtain the raw bytes of a database: the local file when it exists,
 * otherwise a download from the source URL (gunzipped for .gz URLs)
 */
export async function readDatabaseBytes(
  source: DatabaseSourceConfig,
  options: ReadOptions = {}
): Promise<Buffer> {
  if (fs.existsSync(source.path)) {
    console.log(`Reading ${source.name} from ${source.path}`);
    return fs.promises.readFile(source.path);
  }

  const fetchImpl = options.fetchImpl ?? fetch;
  const timeoutMs = options.timeoutMs ?? 30000;

  console.log(`${source.path} not found, downloading ${source.name} from ${source.url}`);

  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetchImpl(source.url, { signal: controller.signal });
    if (!response.ok) {
      throw new Error(
        `Failed to download ${source.name}: ${response.status} ${response.statusText}`
      );
    }

    const body = Buffer.from(await response.arrayBuffer());
    return source.url.endsWith(".gz") ? await gunzipAsync(body) : body;
  } finally {
    clearTimeout(timer);
  }
}
