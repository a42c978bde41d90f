import { createServer, IncomingMessage, Server, ServerResponse } from "http";
import { AddressInfo } from "net";
import { Duplex } from "stream";
import { URL } from "url";
import WebSocket, { WebSocketServer } from "ws";
import {
  ApiResponse,
  createEvent,
  parseDeviceValue,
  parsePercent,
  parseRunCommandRequest,
} from "../../shared/src/contracts";
import { AccessPolicy, FetchFn } from "./accessPolicy";
import { ClientRegistry, WsPushClient } from "./clientRegistry";
import { CommandRunner } from "./commandRunner";
import { CommandDispatcher } from "./dispatcher";
import { listDrivesOrCached } from "./driveMonitor";
import { AgentError, errorMessage } from "./errors";
import { listDirectory, resolveInsideMounts } from "./fsListing";
import { HostControl } from "./hostControl";
import { Logger } from "./logger";
import { MetricsStore } from "./metricsStore";
import { proxyRequest } from "./proxy";
import { SystemSampler } from "./systemSampler";
import { AGENT_SERVER_NAME, AGENT_VERSION, AgentConfig } from "./types";

const MAX_JSON_BODY_BYTES = 1_000_000;
const MAX_PROXY_BODY_BYTES = 10_000_000;
const REQUEST_TIMEOUT_MS = 20_000;

export interface AgentServerDeps {
  config: AgentConfig;
  policy: AccessPolicy;
  registry: ClientRegistry;
  dispatcher: CommandDispatcher;
  store: MetricsStore;
  host: HostControl;
  sampler: SystemSampler;
  runner: Pick<CommandRunner, "runShell">;
  logger: Logger;
  fetchImpl?: FetchFn;
}

export interface ListeningPorts {
  http: number;
  channel: number;
}

interface RouteResult {
  data: unknown;
}

/**
 * HTTP surface and push-channel listener.
 *
 * Both listeners run the access policy before anything else. The HTTP server
 * serves `/rotur` unauthenticated; the channel server only accepts upgrades.
 */
export class AgentServer {
  private httpServer: Server | null = null;
  private channelServer: Server | null = null;
  private wsServer: WebSocketServer | null = null;
  private requestSeq = 0;
  private clientSeq = 0;

  public constructor(private readonly deps: AgentServerDeps) {}

  public async start(): Promise<ListeningPorts> {
    if (this.httpServer && this.channelServer) {
      return this.ports();
    }

    const { config, logger } = this.deps;

    this.httpServer = createServer((request, response) => {
      void this.handleRequest(request, response);
    });
    this.httpServer.requestTimeout = REQUEST_TIMEOUT_MS;

    this.wsServer = new WebSocketServer({ noServer: true });
    this.channelServer = createServer((request, response) => {
      this.writeJson(response, 426, { status: "error", message: "Upgrade Required" });
    });
    this.channelServer.on("upgrade", (request, socket, head) => {
      this.handleUpgrade(request, socket, head);
    });

    await listen(this.httpServer, config.port, config.bindHost);
    await listen(this.channelServer, config.channelPort, config.bindHost);

    const ports = this.ports();
    logger.info(`HTTP surface listening on http://${config.bindHost}:${ports.http}`);
    logger.info(`Push channel listening on ws://${config.bindHost}:${ports.channel}`);
    return ports;
  }

  public ports(): ListeningPorts {
    return {
      http: boundPort(this.httpServer),
      channel: boundPort(this.channelServer),
    };
  }

  public async stop(): Promise<void> {
    if (this.wsServer) {
      this.wsServer.removeAllListeners();
      this.wsServer.clients.forEach((socket) => {
        socket.terminate();
      });
      this.wsServer = null;
    }

    await Promise.all([close(this.httpServer), close(this.channelServer)]);
    this.httpServer = null;
    this.channelServer = null;
    this.deps.logger.info("Agent server stopped.");
  }

  private async handleRequest(request: IncomingMessage, response: ServerResponse): Promise<void> {
    const { logger, policy } = this.deps;
    const requestId = this.nextRequestId();
    const startedAt = Date.now();
    const method = request.method ?? "GET";

    try {
      const parsedUrl = parseRequestUrl(request.url);
      const pathname = parsedUrl.pathname;
      logger.debug(`[${requestId}] ${method} ${pathname}`);

      if (method === "GET" && pathname === "/rotur") {
        response.statusCode = 200;
        response.setHeader("access-control-allow-origin", "*");
        response.setHeader("content-type", "text/plain; charset=utf-8");
        response.end("true");
        return;
      }

      const origin = headerValue(request.headers.origin);
      if (!policy.isPermitted(request.socket.remoteAddress, origin)) {
        logger.warn(
          `[${requestId}] Access denied ${method} ${pathname} remote=${normalizeRemoteHost(request.socket.remoteAddress)}${
            origin ? ` origin=${sanitizeHeaderValue(origin)}` : ""
          }`,
        );
        this.writeEnvelope(response, 403, { status: "error", message: "Access denied" });
        return;
      }

      this.applyCorsHeaders(request, response, origin);

      if (method === "OPTIONS") {
        response.statusCode = 204;
        response.end();
        return;
      }

      if (pathname === "/proxy") {
        await this.handleProxy(method, parsedUrl, request, response, requestId);
        return;
      }

      const result = await this.route(method, parsedUrl, request);
      if (!result) {
        this.writeEnvelope(response, 404, { status: "error", message: `Route not found: ${method} ${pathname}` });
        return;
      }

      this.writeEnvelope(response, 200, { status: "success", data: result.data });
    } catch (error) {
      if (error instanceof AgentError) {
        this.writeEnvelope(response, error.httpStatus, { status: "error", message: error.message });
        return;
      }

      logger.error(`[${requestId}] Unhandled request error: ${errorMessage(error)}`);
      this.writeEnvelope(response, 500, { status: "error", message: "Unexpected agent error." });
    } finally {
      logger.debug(`[${requestId}] Completed in ${Date.now() - startedAt} ms`);
    }
  }

  private async route(method: string, parsedUrl: URL, request: IncomingMessage): Promise<RouteResult | null> {
    const { host, sampler, store, runner } = this.deps;
    const pathname = parsedUrl.pathname;

    if (method === "GET" && pathname === "/sysinfo") {
      return { data: sampler.describe(await host.isBluetoothAvailable()) };
    }

    if (method === "GET" && pathname === "/metrics") {
      return { data: store.snapshot() };
    }

    if (method === "GET" && pathname === "/usb/drives") {
      return { data: { drives: await listDrivesOrCached(host, store) } };
    }

    if (method === "GET" && pathname === "/usb/unmounted") {
      const unmounted = await host.listUnmountedDrives();
      if (!unmounted) {
        throw new AgentError("UPSTREAM_ERROR", "Drive scan failed.");
      }
      return { data: { unmounted } };
    }

    if (method === "POST" && pathname === "/usb/mount") {
      const body = requireField(parseJsonBody(await readBody(request, MAX_JSON_BODY_BYTES)), "device");
      return { data: await host.mountDrive(validate(() => parseDeviceValue(body))) };
    }

    if (method === "POST" && pathname === "/usb/remove") {
      const body = requireField(parseJsonBody(await readBody(request, MAX_JSON_BODY_BYTES)), "device");
      return { data: await host.unmountDrive(validate(() => parseDeviceValue(body))) };
    }

    if (method === "GET" && pathname === "/fs/list") {
      return { data: await this.listMountedPath(parsedUrl.searchParams.get("path") ?? "") };
    }

    if (method === "GET" && pathname === "/volume/get") {
      return { data: await host.getVolume() };
    }

    const volumeMatch = pathname.match(/^\/volume\/set\/([^/]+)$/);
    if (method === "GET" && volumeMatch) {
      const level = validate(() => parsePercent(decodeURIComponent(volumeMatch[1]), "volume", 50));
      return { data: await host.setVolume(level) };
    }

    if (method === "POST" && pathname === "/volume/mute") {
      return { data: await host.toggleMute() };
    }

    if (method === "GET" && pathname === "/brightness/get") {
      return { data: await host.getBrightness() };
    }

    const brightnessMatch = pathname.match(/^\/brightness\/set\/([^/]+)$/);
    if (method === "GET" && brightnessMatch) {
      const level = validate(() => parsePercent(decodeURIComponent(brightnessMatch[1]), "brightness", 100));
      return { data: await host.setBrightness(level) };
    }

    if (method === "POST" && pathname === "/run") {
      const body = parseJsonBody(await readBody(request, MAX_JSON_BODY_BYTES));
      const run = validate(() => parseRunCommandRequest(body));
      return { data: await runner.runShell(run.command, { timeoutMs: run.timeoutMs }) };
    }

    return null;
  }

  private async listMountedPath(requested: string): Promise<{ path: string; contents: unknown[] }> {
    if (!requested.trim()) {
      throw new AgentError("INVALID_INPUT", "Query parameter 'path' is required.");
    }

    const drives = (await this.deps.host.listDrives()) ?? this.deps.store.get("drives").value ?? [];
    const target = resolveInsideMounts(requested, drives);
    if (!target) {
      throw new AgentError("FORBIDDEN", "Access denied - path not in mounted USB drive");
    }

    try {
      return { path: target, contents: await listDirectory(target) };
    } catch (error) {
      throw new AgentError("NOT_FOUND", `Cannot list ${target}: ${errorMessage(error)}`);
    }
  }

  private async handleProxy(
    method: string,
    parsedUrl: URL,
    request: IncomingMessage,
    response: ServerResponse,
    requestId: string,
  ): Promise<void> {
    const target = parsedUrl.searchParams.get("url");
    if (!target) {
      throw new AgentError("INVALID_INPUT", "URL parameter missing");
    }

    const query = new URLSearchParams(parsedUrl.searchParams);
    query.delete("url");

    this.deps.logger.debug(`[${requestId}] proxy ${method} ${target}`);
    const proxied = await proxyRequest(
      {
        target,
        method,
        headers: request.headers,
        body: await readBody(request, MAX_PROXY_BODY_BYTES),
        query,
        timeoutMs: this.deps.config.proxyTimeoutMs,
      },
      this.deps.fetchImpl,
    );

    response.statusCode = proxied.status;
    for (const [key, value] of Object.entries(proxied.headers)) {
      response.setHeader(key, value);
    }
    response.end(proxied.body);
  }

  private handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer): void {
    const { policy, logger } = this.deps;
    const origin = headerValue(request.headers.origin);

    if (!policy.isPermitted(request.socket.remoteAddress, origin)) {
      logger.warn(
        `Channel connection refused remote=${normalizeRemoteHost(request.socket.remoteAddress)} origin=${
          sanitizeHeaderValue(origin) || "(missing)"
        }`,
      );
      socket.once("finish", () => socket.destroy());
      socket.end("HTTP/1.1 403 Forbidden\r\nConnection: close\r\nContent-Length: 0\r\n\r\n");
      return;
    }

    if (!this.wsServer) {
      socket.destroy();
      return;
    }

    this.wsServer.handleUpgrade(request, socket, head, (clientSocket) => {
      this.acceptClient(clientSocket, request, origin ?? "");
    });
  }

  private acceptClient(socket: WebSocket, request: IncomingMessage, origin: string): void {
    const { registry, dispatcher, logger } = this.deps;
    this.clientSeq += 1;
    const client = new WsPushClient(
      `client-${this.clientSeq}`,
      normalizeRemoteHost(request.socket.remoteAddress),
      origin,
      socket,
    );

    socket.on("message", (data) => {
      void dispatcher.handle(client, rawDataToString(data));
    });

    socket.on("close", () => {
      registry.unregister(client);
    });

    socket.on("error", (error) => {
      logger.debug(`Channel socket error for ${client.id}: ${errorMessage(error)}`);
      registry.unregister(client);
    });

    registry.register(client);
    void this.greet(client);
  }

  /**
   * Sends the join sequence: handshake, system info, the metrics snapshot and
   * the cached drive list.
   */
  private async greet(client: WsPushClient): Promise<void> {
    const { registry, host, sampler, store, logger } = this.deps;

    try {
      await registry.sendTo(client, createEvent("handshake", { server: AGENT_SERVER_NAME, version: AGENT_VERSION }));
      await registry.sendTo(client, createEvent("system_info", sampler.describe(await host.isBluetoothAvailable())));
      await registry.sendTo(client, createEvent("metrics", store.snapshot()));
      await registry.sendTo(
        client,
        createEvent("drives_update", { drives: store.get("drives").value ?? [], change_type: "initial" }),
      );
    } catch (error) {
      logger.warn(`Greeting ${client.id} failed: ${errorMessage(error)}`);
    }
  }

  private applyCorsHeaders(request: IncomingMessage, response: ServerResponse, origin: string | undefined): void {
    if (!origin) {
      return;
    }

    response.setHeader("access-control-allow-origin", origin);
    response.setHeader("access-control-allow-methods", "GET,POST,PUT,DELETE,PATCH,OPTIONS");
    response.setHeader(
      "access-control-allow-headers",
      headerValue(request.headers["access-control-request-headers"]) ?? "content-type",
    );
    response.setHeader("access-control-max-age", "600");
    appendVaryHeader(response, "Origin");
  }

  private writeEnvelope(response: ServerResponse, statusCode: number, payload: ApiResponse<unknown>): void {
    this.writeJson(response, statusCode, payload);
  }

  private writeJson(response: ServerResponse, statusCode: number, payload: unknown): void {
    response.statusCode = statusCode;
    response.setHeader("content-type", "application/json; charset=utf-8");
    response.end(JSON.stringify(payload));
  }

  private nextRequestId(): string {
    this.requestSeq += 1;
    return `req-${this.requestSeq}`;
  }
}

function listen(server: Server, port: number, host: string): Promise<void> {
  return new Promise<void>((resolvePromise, rejectPromise) => {
    server.once("error", rejectPromise);
    server.listen(port, host, () => {
      server.off("error", rejectPromise);
      resolvePromise();
    });
  });
}

function close(server: Server | null): Promise<void> {
  if (!server) {
    return Promise.resolve();
  }

  return new Promise<void>((resolvePromise) => {
    server.close(() => resolvePromise());
    server.closeAllConnections();
  });
}

function boundPort(server: Server | null): number {
  const address: AddressInfo | string | null | undefined = server?.address();
  return address && typeof address === "object" ? address.port : 0;
}

/**
 * Only the path and query are read, so the client's Host header plays no part.
 */
function parseRequestUrl(target: string | undefined): URL {
  try {
    return new URL(target ?? "/", "http://localhost");
  } catch {
    throw new AgentError("INVALID_INPUT", "Malformed request URL.");
  }
}

async function readBody(request: IncomingMessage, limit: number): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let totalBytes = 0;

  for await (const chunk of request) {
    const piece = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    totalBytes += piece.length;

    if (totalBytes > limit) {
      throw new AgentError("INVALID_INPUT", "Request body exceeded limit.");
    }

    chunks.push(piece);
  }

  return Buffer.concat(chunks);
}

function parseJsonBody(raw: Buffer): unknown {
  if (raw.length === 0) {
    return {};
  }

  try {
    return JSON.parse(raw.toString("utf8"));
  } catch (error) {
    throw new AgentError("INVALID_INPUT", `Invalid JSON payload: ${errorMessage(error)}`);
  }
}

function requireField(body: unknown, field: string): unknown {
  if (body && typeof body === "object" && !Array.isArray(body) && field in body) {
    return body;
  }
  throw new AgentError("INVALID_INPUT", `Field '${field}' is required.`);
}

/**
 * Runs a payload parser and reports its failure as a 400.
 */
function validate<T>(parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    if (error instanceof AgentError) {
      throw error;
    }
    throw new AgentError("INVALID_INPUT", errorMessage(error));
  }
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString("utf8");
  }
  return data.toString("utf8");
}

function headerValue(value: string | string[] | undefined): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  const trimmed = first?.trim();
  return trimmed ? trimmed : undefined;
}

function normalizeRemoteHost(address: string | undefined): string {
  if (!address) {
    return "unknown";
  }

  if (address.startsWith("::ffff:")) {
    return address.slice(7);
  }

  return address;
}

function appendVaryHeader(response: ServerResponse, token: string): void {
  const existing = response.getHeader("vary");
  const incoming = token.toLowerCase();

  if (!existing) {
    response.setHeader("vary", token);
    return;
  }

  const current = String(existing)
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);

  if (!current.some((item) => item.toLowerCase() === incoming)) {
    current.push(token);
    response.setHeader("vary", current.join(", "));
  }
}

function sanitizeHeaderValue(value: string | undefined): string {
  if (!value) {
    return "";
  }

  return value.slice(0, 160).replace(/\s+/g, " ").trim();
}
