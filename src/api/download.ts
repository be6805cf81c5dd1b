/**
 * Icon download
 *
 * Resolves GET /item/icon/download/{id}?format=... to an asset, falling back to
 * /item/icon/download/{id}/{format} when the query-style route 404s (accounts
 * disagree on where `format` goes). The resolve response is either a JSON
 * envelope pointing at a CDN URL or the image itself.
 */

import { open, rm, writeFile } from "fs/promises";
import type { FileHandle } from "fs/promises";
import { DownloadEnvelopeSchema } from "../types";
import type { IconFormat } from "../types";
import { parseJson } from "../utils/parse-json";
import { authHeaders, buildUrl, withTimeout } from "./client";
import type { ApiClient, QueryParams } from "./client";
import {
  AssetError,
  DownloadError,
  UnexpectedResponseError,
  excerpt,
} from "./errors";

export interface DownloadRequest {
  id: number;
  format: IconFormat;
  size: number; // PNG only
  destination: string;
  chunkSize: number;
}

interface ResolvedDownload {
  status: number;
  contentType: string;
  body: Buffer;
}

async function resolve(
  client: ApiClient,
  token: string,
  path: string,
  params: QueryParams,
): Promise<ResolvedDownload> {
  const url = buildUrl(client.baseUrl, path, params);
  client.logger.debug(`GET ${url}`);

  return withTimeout(client, url, async (signal) => {
    const response = await fetch(url, { headers: authHeaders(token), signal });
    return {
      status: response.status,
      contentType: response.headers.get("content-type") ?? "",
      body: Buffer.from(await response.arrayBuffer()),
    };
  });
}

function extractAssetUrl(body: Buffer): string | null {
  const parsed = DownloadEnvelopeSchema.safeParse(
    parseJson(body.toString("utf-8")),
  );
  return parsed.success ? parsed.data.data.url : null;
}

function isImageContentType(contentType: string): boolean {
  return contentType.includes("image/") || contentType.includes("svg");
}

/**
 * Stream an unauthenticated asset URL to disk, writing at most `chunkSize`
 * bytes per write. A partial file is removed when the transfer fails.
 */
async function streamAsset(
  client: ApiClient,
  url: string,
  destination: string,
  chunkSize: number,
): Promise<void> {
  client.logger.debug(`GET ${url}`);

  await withTimeout(client, url, async (signal) => {
    const response = await fetch(url, { signal });

    if (!response.ok) {
      const body = excerpt(await response.text(), client.excerptLength);
      throw new AssetError(
        `Asset fetch failed: HTTP ${response.status} for ${url}`,
        response.status,
        body,
      );
    }

    const stream = response.body;
    if (!stream) {
      throw new AssetError(`Asset response has no body: ${url}`, response.status);
    }

    let handle: FileHandle;
    try {
      handle = await open(destination, "w");
    } catch (error) {
      await stream.cancel().catch(() => undefined);
      throw error;
    }

    const reader = stream.getReader();
    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;

        const chunk: Uint8Array = value;
        for (let offset = 0; offset < chunk.length; offset += chunkSize) {
          await handle.write(chunk.subarray(offset, offset + chunkSize));
        }
      }
    } catch (error) {
      // Release the connection before dropping the partial file
      await reader.cancel().catch(() => undefined);
      await handle.close();
      await rm(destination, { force: true });
      throw error;
    }

    await handle.close();
  });
}

export async function downloadIcon(
  client: ApiClient,
  token: string,
  request: DownloadRequest,
): Promise<string> {
  const { id, format, size, destination } = request;
  const sizeParams: QueryParams = format === "png" && size ? { size } : {};

  let resolved = await resolve(client, token, `/item/icon/download/${id}`, {
    format,
    ...sizeParams,
  });

  if (resolved.status === 404) {
    client.logger.debug(
      `Icon ${id}: query-style download not found, retrying with format in path`,
    );
    resolved = await resolve(
      client,
      token,
      `/item/icon/download/${id}/${format}`,
      sizeParams,
    );
  }

  if (resolved.status !== 200) {
    const body = excerpt(resolved.body.toString("utf-8"), client.excerptLength);
    throw new DownloadError(
      `Download error for ${id}: ${resolved.status} ${body}`,
      resolved.status,
      body,
    );
  }

  // Preferred: JSON envelope with data.url
  const assetUrl = extractAssetUrl(resolved.body);
  if (assetUrl) {
    await streamAsset(client, assetUrl, destination, request.chunkSize);
    return destination;
  }

  // Some accounts receive the file directly
  if (isImageContentType(resolved.contentType)) {
    await writeFile(destination, resolved.body);
    return destination;
  }

  const body = excerpt(resolved.body.toString("utf-8"), client.excerptLength);
  throw new UnexpectedResponseError(
    `Unexpected download response for ${id}: ${body}`,
    resolved.status,
    body,
  );
}
