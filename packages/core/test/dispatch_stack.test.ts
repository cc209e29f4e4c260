import { describe, expect, it, vi } from "vitest";
import { Dispatcher, DispatchStack } from "../src/dispatching/mod.ts";
import type { MiddlewareFn, Next } from "../src/dispatching/mod.ts";
import { ServerRequest, ServerResponse } from "../src/message/mod.ts";

const passThrough: MiddlewareFn = (req, res, next) => next(req, res);

const finalNext: Next = (_req, res) =>
  Promise.resolve(res.withHeader("X-Final", "yes"));

describe("DispatchStack", () => {
  it("should dispatch middleware in the order added", async () => {
    const order: number[] = [];

    const mw1: MiddlewareFn = async (req, res, next) => {
      order.push(1);
      const response = await next(req, res);
      order.push(4);
      return response;
    };

    const mw2: MiddlewareFn = async (req, res, next) => {
      order.push(2);
      const response = await next(req, res);
      order.push(3);
      return response;
    };

    const stack = new DispatchStack(new Dispatcher()).add(mw1).add(mw2);
    await stack.dispatch(new ServerRequest(), new ServerResponse(), finalNext);

    expect(order).toEqual([1, 2, 3, 4]);
  });

  it("should pass the request and response each middleware hands on", async () => {
    const mw1: MiddlewareFn = (req, res, next) =>
      next(req.withAttribute("value", 1), res.withHeader("X-One", "1"));

    const mw2: MiddlewareFn = (req, res, next) =>
      next(
        req.withAttribute("value", req.getAttribute("value", 0) + 1),
        res.withHeader("X-Two", "2"),
      );

    const stack = new DispatchStack(new Dispatcher()).add(mw1).add(mw2);
    let seen: unknown;

    const response = await stack.dispatch(
      new ServerRequest(),
      new ServerResponse(),
      (req, res) => {
        seen = req.getAttribute("value");
        return Promise.resolve(res);
      },
    );

    expect(seen).toBe(2);
    expect(response.getHeader("X-One")).toBe("1");
    expect(response.getHeader("X-Two")).toBe("2");
  });

  it("should stop at middleware that does not call next", async () => {
    const order: string[] = [];
    const a: MiddlewareFn = (req, res, next) => {
      order.push("a");
      return next(req, res);
    };
    const b: MiddlewareFn = (_req, res) => {
      order.push("b");
      return res.withStatus(403).withText("B says no");
    };
    const c: MiddlewareFn = (req, res, next) => {
      order.push("c");
      return next(req, res);
    };
    const next = vi.fn<Next>();

    const stack = new DispatchStack(new Dispatcher()).add(a).add(b).add(c);
    const response = await stack.dispatch(
      new ServerRequest(),
      new ServerResponse(),
      next,
    );

    expect(order).toEqual(["a", "b"]);
    expect(response.status).toBe(403);
    expect(response.body).toBe("B says no");
    expect(next).not.toHaveBeenCalled();
  });

  it("should call next with the original request and response when empty", async () => {
    const request = new ServerRequest({ target: "/x" });
    const response = new ServerResponse();
    const next = vi.fn<Next>((_req, res) => Promise.resolve(res));

    const stack = new DispatchStack(new Dispatcher());
    const result = await stack.dispatch(request, response, next);

    expect(next).toHaveBeenCalledTimes(1);
    expect(next).toHaveBeenCalledWith(request, response);
    expect(result).toBe(response);
  });

  it("should return the result of next when every middleware continues", async () => {
    const stack = new DispatchStack(new Dispatcher())
      .add(passThrough)
      .add(passThrough);

    const response = await stack.dispatch(
      new ServerRequest(),
      new ServerResponse(),
      finalNext,
    );

    expect(response.getHeader("X-Final")).toBe("yes");
  });

  it("should let middleware change the response after next returns", async () => {
    const wrap: MiddlewareFn = async (req, res, next) => {
      const response = await next(req, res);
      return response.withHeader("X-Wrapped", String(response.status));
    };
    const inner: MiddlewareFn = (_req, res) => res.withStatus(201);

    const stack = new DispatchStack(new Dispatcher()).add(wrap).add(inner);
    const response = await stack.dispatch(
      new ServerRequest(),
      new ServerResponse(),
      finalNext,
    );

    expect(response.getHeader("X-Wrapped")).toBe("201");
  });

  it("should nest as middleware inside another stack", async () => {
    const dispatcher = new Dispatcher();
    const inner = new DispatchStack(dispatcher)
      .add((req, res, next) => next(req, res.withHeader("X-Inner", "1")));
    const outer = new DispatchStack(dispatcher)
      .add(inner)
      .add((_req, res) => res.withText("done"));

    const response = await outer.dispatch(
      new ServerRequest(),
      new ServerResponse(),
      finalNext,
    );

    expect(response.getHeader("X-Inner")).toBe("1");
    expect(response.body).toBe("done");
    expect(response.getHeader("X-Final")).toBeNull();
  });

  it("should report how many middleware it holds", () => {
    const stack = new DispatchStack(new Dispatcher())
      .add(passThrough)
      .add(passThrough);

    expect(stack.length).toBe(2);
  });

  it("should propagate errors from middleware", async () => {
    const failing: MiddlewareFn = () => {
      throw new Error("Middleware error");
    };
    const stack = new DispatchStack(new Dispatcher())
      .add(passThrough)
      .add(failing);

    await expect(
      stack.dispatch(new ServerRequest(), new ServerResponse(), finalNext),
    ).rejects.toThrow("Middleware error");
  });

  it("should propagate errors from next", async () => {
    const stack = new DispatchStack(new Dispatcher()).add(passThrough);

    await expect(
      stack.dispatch(new ServerRequest(), new ServerResponse(), () => {
        throw new Error("Handler error");
      }),
    ).rejects.toThrow("Handler error");
  });
});
