import { HttpStatusError } from "../utils/errors.js";

export interface PostJsonOptions {
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

/** POST a JSON body and return the decoded JSON response. Non-2xx responses throw HttpStatusError. */
export async function postJson(
  url: string,
  body: unknown,
  options: PostJsonOptions = {},
): Promise<unknown> {
  const response = await fetch(url, {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      Accept: "application/json",
      ...options.headers,
    },
    body: JSON.stringify(body),
    signal: options.signal,
  });

  if (!response.ok) {
    const errorText = await response.text();
    throw new HttpStatusError(response.status, errorText, url);
  }

  const data: unknown = await response.json();
  return data;
}

/** Join a base URL and a path without doubling or dropping the slash. */
export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}
