/**
 * Exchange the API key for a temporary bearer token (valid ~24h)
 */

import { TokenResponseSchema } from "../types";
import { parseJson } from "../utils/parse-json";
import { buildUrl, withTimeout } from "./client";
import type { ApiClient } from "./client";
import { AuthError, excerpt } from "./errors";

export async function authenticate(
  client: ApiClient,
  apiKey: string,
): Promise<string> {
  const url = buildUrl(client.baseUrl, "/app/authentication");
  client.logger.debug(`POST ${url}`);

  return withTimeout(client, url, async (signal) => {
    // The endpoint only accepts multipart/form-data
    const form = new FormData();
    form.append("apikey", apiKey);

    const response = await fetch(url, {
      method: "POST",
      body: form,
      headers: { Accept: "application/json" },
      signal,
    });
    const text = await response.text();
    const body = excerpt(text, client.excerptLength);

    if (response.status !== 200) {
      throw new AuthError(
        `Auth failed: ${response.status} ${body}`,
        response.status,
        body,
      );
    }

    const parsed = TokenResponseSchema.safeParse(parseJson(text));
    const token = parsed.success
      ? (parsed.data.data?.token ?? parsed.data.token)
      : undefined;
    if (!token) {
      throw new AuthError(`Auth response missing token: ${body}`, 200, body);
    }

    return token;
  });
}
