/**
 * Gateway method contract: handlers receive raw params and answer once via `respond`.
 */

export type GatewayRespond = (ok: boolean, payload: Record<string, unknown>) => void;

export type GatewayRequestHandlerOptions = {
  params: unknown;
  respond: GatewayRespond;
};

export type GatewayRequestHandler = (options: GatewayRequestHandlerOptions) => Promise<void>;

export type HttpRouteHandler<Req, Res> = (req: Req, res: Res) => Promise<void>;

export type GatewayService = {
  id: string;
  start?: () => Promise<void> | void;
  stop?: () => Promise<void> | void;
};
