// backend/services/schooldata/test/helpers/axiosStub.ts
import axios, {
  AxiosError,
  type AxiosInstance,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from "axios";

export type StubReply =
  | { status: number; data: unknown; headers?: Record<string, string> }
  | { error: string; message?: string };

export type StubRequest = { url: string; params: Record<string, unknown> };

/**
 * axios instance whose adapter answers in-process from a script of replies;
 * requests are recorded. The last reply repeats once the script runs out.
 */
export function stubAxios(replies: StubReply[]): { http: AxiosInstance; requests: StubRequest[] } {
  const requests: StubRequest[] = [];
  let i = 0;

  const http = axios.create({
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      const params: Record<string, unknown> = { ...config.params };
      requests.push({ url: config.url ?? "", params });
      const reply = replies[Math.min(i++, replies.length - 1)];
      if (!reply) throw new Error("stubAxios: no replies scripted");
      if ("error" in reply) {
        throw new AxiosError(reply.message ?? reply.error, reply.error, config);
      }
      return {
        data: reply.data,
        status: reply.status,
        statusText: String(reply.status),
        headers: reply.headers ?? {},
        config,
      };
    },
  });

  return { http, requests };
}
