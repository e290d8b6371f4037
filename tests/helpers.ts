import os from "node:os";
import path from "node:path";
import { AxiosError, type AxiosResponse, type InternalAxiosRequestConfig } from "axios";
import fs from "fs-extra";

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "hexpm-mirror-"));
}

function requestConfig(url: string): InternalAxiosRequestConfig {
  return {
    url,
    headers: {}
  } as InternalAxiosRequestConfig;
}

export function okResponse<T>(url: string, data: T): AxiosResponse<T> {
  return {
    status: 200,
    statusText: "OK",
    headers: {},
    config: requestConfig(url),
    data
  } satisfies AxiosResponse<T>;
}

export function httpError(url: string, status: number): AxiosError {
  const error = new AxiosError(`Request failed with status code ${status}`);
  error.response = {
    status,
    statusText: status === 429 ? "Too Many Requests" : "Error",
    headers: {},
    config: requestConfig(url),
    data: null
  } satisfies AxiosResponse;
  return error;
}
