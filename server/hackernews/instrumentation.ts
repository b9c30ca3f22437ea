import axios, { type AxiosInstance } from "axios";
import { randomBytes } from "crypto";

// W3C trace context, version 00, sampled
export const createTraceparent = (): string =>
  `00-${randomBytes(16).toString("hex")}-${randomBytes(8).toString("hex")}-01`;

/**
 * Hosts may be listed bare ("example.com") or with a port
 * ("localhost:3000"); a bare entry matches any port.
 */
export const isFirstPartyUrl = (url: string, hosts: string[]): boolean => {
  try {
    const parsed = new URL(url);
    return hosts.includes(parsed.host) || hosts.includes(parsed.hostname);
  } catch {
    return false;
  }
};

/**
 * Attaches request tracing and response logging to an axios instance.
 * Every request to a first-party host carries a fresh `traceparent` header.
 */
export const instrument = (
  http: AxiosInstance,
  firstPartyHosts: string[]
): void => {
  http.interceptors.request.use((config) => {
    if (isFirstPartyUrl(http.getUri(config), firstPartyHosts)) {
      config.headers.set("traceparent", createTraceparent());
    }
    return config;
  });

  http.interceptors.response.use(
    (response) => {
      console.log(
        `Response received: ${http.getUri(response.config)} - Status: ${response.status}`
      );
      return response;
    },
    (error: unknown) => {
      if (!axios.isCancel(error)) {
        const url =
          axios.isAxiosError(error) && error.config
            ? http.getUri(error.config)
            : "unknown url";
        const message = error instanceof Error ? error.message : String(error);
        console.error(`Request failed: ${url} - ${message}`);
      }
      return Promise.reject(error);
    }
  );
};
