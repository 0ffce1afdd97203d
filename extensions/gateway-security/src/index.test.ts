import { Readable } from "node:stream";
import { describe, expect, it, vi } from "vitest";
import { createAdmissionStore } from "./admission/create-store.js";
import type { AdmissionGuard } from "./admission/guard.js";
import type { IpStatusRequest, IpStatusResponse } from "./admission/http.js";
import { RedisAdmissionStore } from "./admission/redis-store.js";
import { InMemoryAdmissionStore } from "./admission/store.js";
import { resolveConfig } from "./config.js";
import plugin, { CLAIM_VERIFY_METHOD, type GatewaySecurityHostApi } from "./index.js";
import type { GatewayRequestHandler, GatewayService, HttpRouteHandler } from "./types.js";

function createHost(pluginConfig?: Record<string, unknown>) {
  const methods = new Map<string, GatewayRequestHandler>();
  const routes = new Map<string, HttpRouteHandler<IpStatusRequest, IpStatusResponse>>();
  const guards: AdmissionGuard[] = [];
  const services: GatewayService[] = [];
  const logger = { info: vi.fn(), warn: vi.fn() };

  const api: GatewaySecurityHostApi = {
    pluginConfig,
    logger,
    registerGatewayMethod: (method, handler) => {
      methods.set(method, handler);
    },
    registerHttpRoute: (route) => {
      routes.set(route.path, route.handler);
    },
    registerAdmissionGuard: (guard) => {
      guards.push(guard);
    },
    registerService: (service) => {
      services.push(service);
    },
  };

  return { api, methods, routes, guards, services, logger };
}

class CapturedResponse {
  statusCode = 200;
  readonly headers = new Map<string, string>();
  body: string | undefined;

  setHeader(name: string, value: string): void {
    this.headers.set(name.toLowerCase(), value);
  }

  end(body?: string): void {
    this.body = body;
  }
}

describe("gateway-security plugin", () => {
  it("registers its method, route, guard and service", () => {
    const host = createHost();
    plugin.register(host.api);

    expect([...host.methods.keys()]).toEqual([CLAIM_VERIFY_METHOD]);
    expect([...host.routes.keys()]).toEqual(["/ip-status"]);
    expect(host.guards).toHaveLength(1);
    expect(host.services.map((service) => service.id)).toEqual(["gateway-security-store"]);
    expect(host.logger.info).toHaveBeenCalledWith("[gateway-security] registered (store: memory)");
  });

  it("shares one store between the HTTP route and the guard", async () => {
    const host = createHost();
    plugin.register(host.api);
    const route = host.routes.get("/ip-status");
    const guard = host.guards[0];
    if (!route || !guard) throw new Error("plugin did not register its surfaces");

    const res = new CapturedResponse();
    const req = Object.assign(
      Readable.from([Buffer.from(JSON.stringify([{ ip: "203.0.113.7", status: 1 }]))]),
      { method: "POST" },
    );
    await route(req, res);

    expect(res.statusCode).toBe(204);
    await expect(guard.check("203.0.113.7")).resolves.toMatchObject({ action: "reject" });
  });

  it("rejects incomplete claims through the gateway method", async () => {
    const host = createHost();
    plugin.register(host.api);
    const handler = host.methods.get(CLAIM_VERIFY_METHOD);
    if (!handler) throw new Error("claim verify method missing");
    const respond = vi.fn();

    await handler({ params: { address: "0x00" }, respond });

    expect(respond).toHaveBeenCalledWith(false, {
      error: "E_INVALID_ARGUMENT",
      message: "address, date_message and signature are required",
    });
  });

  it("closes the store when the service stops", async () => {
    const host = createHost({ store: { mode: "memory" } });
    plugin.register(host.api);

    await host.services[0]?.stop?.();

    expect(host.logger.info).toHaveBeenLastCalledWith("[gateway-security] admission store closed");
  });
});

describe("createAdmissionStore", () => {
  it("builds the backend named by the config", () => {
    expect(createAdmissionStore(resolveConfig())).toBeInstanceOf(InMemoryAdmissionStore);
    // lazyConnect: no socket is opened until the first command
    expect(
      createAdmissionStore(resolveConfig({ store: { mode: "redis", url: "redis://127.0.0.1:6390" } })),
    ).toBeInstanceOf(RedisAdmissionStore);
  });
});
