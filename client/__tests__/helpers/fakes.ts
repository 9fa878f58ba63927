import type { PushSocket, PushSocketFactory, PushSocketHandlers } from "../../push-socket";
import type { HttpMethod, QueryParams, RestResponse, RestTransport } from "../../rest-transport";
import { encodePushFrame } from "../../push-envelope";

export interface RecordedRequest {
  readonly path: string;
  readonly method: HttpMethod;
  readonly params: QueryParams;
  readonly body: unknown;
}

type RouteHandler = (request: RecordedRequest) => unknown;

export class FakeRestTransport implements RestTransport {
  public readonly requests: RecordedRequest[] = [];
  private readonly routes = new Map<string, RouteHandler>();

  /** Answers with `result`, or rejects when `result` is an Error. */
  respond(method: HttpMethod, path: string, result: unknown): this {
    return this.respondWith(method, path, () => {
      if (result instanceof Error) {
        throw result;
      }
      return result;
    });
  }

  respondWith(method: HttpMethod, path: string, handler: RouteHandler): this {
    this.routes.set(`${method} ${path}`, handler);
    return this;
  }

  async request(
    path: string,
    method: HttpMethod = "GET",
    params: QueryParams = {},
    body?: unknown,
  ): Promise<RestResponse> {
    const request: RecordedRequest = { path, method, params, body };
    this.requests.push(request);

    const handler = this.routes.get(`${method} ${path}`);
    if (!handler) {
      throw new Error(`No fake route for ${method} ${path}`);
    }
    return { status: 200, body: handler(request) };
  }

  countRequests(method: HttpMethod, path: string): number {
    return this.requests.filter((request) => request.method === method && request.path === path).length;
  }
}

export class FakePushSocket implements PushSocket {
  public closeCalls = 0;

  constructor(
    public readonly url: string,
    private readonly handlers: PushSocketHandlers,
  ) {}

  close(): void {
    this.closeCalls += 1;
  }

  open(): void {
    this.handlers.onOpen();
  }

  receive(data: string): void {
    this.handlers.onMessage(data);
  }

  receiveEvent(type: string, content: unknown): void {
    this.handlers.onMessage(encodePushFrame(type, content));
  }

  fail(error: Error): void {
    this.handlers.onError(error);
  }

  serverClose(code = 1006, reason = ""): void {
    this.handlers.onClose(code, reason);
  }
}

export class FakePushSocketFactory {
  public readonly sockets: FakePushSocket[] = [];
  public failNext: Error | null = null;

  readonly create: PushSocketFactory = (url, handlers) => {
    if (this.failNext) {
      const error = this.failNext;
      this.failNext = null;
      throw error;
    }
    const socket = new FakePushSocket(url, handlers);
    this.sockets.push(socket);
    return socket;
  };

  get latest(): FakePushSocket {
    const socket = this.sockets[this.sockets.length - 1];
    if (!socket) {
      throw new Error("No push socket has been opened.");
    }
    return socket;
  }
}
