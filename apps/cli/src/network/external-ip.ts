export const unavailableIp = "N/A";

export interface ExternalIpOptions {
  endpoint: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
  onError?: (message: string) => void;
}

const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.name === "TimeoutError" ? "timed out" : error.message;
  }
  return String(error);
};

export const fetchExternalIp = async ({
  endpoint,
  timeoutMs,
  fetchImpl = fetch,
  onError
}: ExternalIpOptions): Promise<string> => {
  try {
    const response = await fetchImpl(endpoint, { signal: AbortSignal.timeout(timeoutMs) });
    if (!response.ok) {
      onError?.(`IP lookup returned HTTP ${response.status}`);
      return unavailableIp;
    }

    const ip = (await response.text()).trim();
    if (!ip) {
      onError?.("IP lookup returned an empty body");
      return unavailableIp;
    }

    return ip;
  } catch (error) {
    onError?.(`IP lookup failed: ${describeError(error)}`);
    return unavailableIp;
  }
};
