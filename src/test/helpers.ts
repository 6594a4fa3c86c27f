import * as NodeFs from "node:fs/promises";
import * as NodeOs from "node:os";
import * as NodePath from "node:path";
import { HttpClient, HttpClientError, HttpClientResponse } from "@effect/platform";
import { Effect, Layer, Logger } from "effect";
import { CensusService } from "../census/client";
import { StateService } from "../state";
import { type TestConfig, createTestConfigProvider } from "./config";

/**
 * Mock response configuration for HttpClient tests.
 */
export interface MockHttpResponse {
  status?: number;
  body?: unknown;
  rawBody?: string;
  headers?: Record<string, string>;
}

/**
 * Request capture info for testing HTTP calls.
 */
export interface CapturedRequest {
  url: string;
  method: string;
}

/**
 * Creates a request capture utility for testing HTTP calls.
 * Returns a tuple of [capturedRequests array, handler function].
 */
export const createRequestCapture = (
  response: MockHttpResponse = { status: 200, body: [] }
): [CapturedRequest[], (req: CapturedRequest) => MockHttpResponse] => {
  const capturedRequests: CapturedRequest[] = [];
  const handler = (req: CapturedRequest): MockHttpResponse => {
    capturedRequests.push(req);
    return response;
  };
  return [capturedRequests, handler];
};

/**
 * Creates a mock HttpClient that returns configured responses.
 * The handler receives the resolved request URL and returns the mock response.
 */
export const createMockHttpClient = (handler: (req: CapturedRequest) => MockHttpResponse) =>
  HttpClient.make((req, url) =>
    Effect.sync(() => {
      const mockResponse = handler({ url: url.toString(), method: req.method });

      const status = mockResponse.status ?? 200;
      const headers = mockResponse.headers ?? { "Content-Type": "application/json" };
      const responseBody =
        mockResponse.rawBody ??
        (mockResponse.body !== undefined ? JSON.stringify(mockResponse.body) : "");

      return HttpClientResponse.fromWeb(req, new Response(responseBody, { status, headers }));
    })
  );

/**
 * Creates a mock HttpClient that fails with a network-level error.
 */
export const createNetworkErrorHttpClient = (errorMessage: string) =>
  HttpClient.make((req) =>
    Effect.fail(
      new HttpClientError.RequestError({
        request: req,
        reason: "Transport",
        cause: new Error(errorMessage),
      })
    )
  );

export const createMockHttpClientLayer = (handler: (req: CapturedRequest) => MockHttpResponse) =>
  Layer.succeed(HttpClient.HttpClient, createMockHttpClient(handler));

export const createNetworkErrorHttpClientLayer = (errorMessage: string) =>
  Layer.succeed(HttpClient.HttpClient, createNetworkErrorHttpClient(errorMessage));

/**
 * Creates a test layer for CensusService backed by a mock HttpClient.
 */
export const createCensusTestLayer = (
  config: TestConfig,
  httpLayer: Layer.Layer<HttpClient.HttpClient>
) =>
  CensusService.DefaultWithoutDependencies.pipe(
    Layer.provide(httpLayer),
    Layer.provide(Layer.setConfigProvider(createTestConfigProvider(config)))
  );

/**
 * Creates a test layer for StateService rooted at the configured data directory.
 */
export const createStateTestLayer = (config: TestConfig) =>
  StateService.Default.pipe(
    Layer.provide(Layer.setConfigProvider(createTestConfigProvider(config)))
  );

/**
 * Builds a Census response body: the header row followed by data rows.
 */
export const censusBody = (
  rows: ReadonlyArray<readonly string[]>,
  headers: readonly string[] = ["POP", "YEAR", "RACE", "SEX", "AGE", "us"]
): string[][] => [[...headers], ...rows.map((row) => [...row])];

/**
 * Creates an empty temporary directory for file-backed store tests.
 */
export const createTempDataDir = (): Promise<string> =>
  NodeFs.mkdtemp(NodePath.join(NodeOs.tmpdir(), "popproj-test-"));

export const removeTempDataDir = (dir: string): Promise<void> =>
  NodeFs.rm(dir, { recursive: true, force: true });

export interface CapturedLog {
  level: string;
  message: string;
}

/**
 * Creates a logger layer that records every log line it receives.
 */
export const createLogCapture = (): [CapturedLog[], Layer.Layer<never>] => {
  const logs: CapturedLog[] = [];
  const captureLogger = Logger.make(({ logLevel, message }) => {
    logs.push({ level: logLevel.label, message: String(message) });
  });
  return [logs, Logger.add(captureLogger)];
};
