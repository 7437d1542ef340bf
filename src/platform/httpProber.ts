export interface ProbeOptions {
  token?: string;
  timeoutMs: number;
}

export interface HttpProber {
  /** Resolves with the response status; rejects when nothing answers. */
  get(url: string, options: ProbeOptions): Promise<number>;
}

export function createHttpProber(): HttpProber {
  return {
    async get(url, options) {
      const headers: Record<string, string> = {};
      if (options.token) {
        headers.Authorization = `Bearer ${options.token}`;
      }
      const response = await fetch(url, {
        headers,
        signal: AbortSignal.timeout(options.timeoutMs),
      });
      return response.status;
    },
  };
}
