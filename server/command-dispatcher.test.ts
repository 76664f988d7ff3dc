import { describe, it, expect, vi } from "vitest";
import {
  CommandDispatcher,
  isCommandObject,
  UNHANDLED,
  type CommandContext,
  type CommandHandler,
  type CommandObject,
} from "./command-dispatcher.js";
import { buildContentRoots } from "./content-roots.js";
import { HandlerFaultError } from "./errors.js";

const context: CommandContext = {
  requestId: "req-1",
  remoteAddress: "127.0.0.1",
  headers: {},
  roots: buildContentRoots(["/app/web", "/app/lib"]),
};

const fixedVersions = { serverVersion: "TestServer/1.0", runtimeVersion: "Runtime/9" };

function handler(name: string, impl: CommandHandler["tryHandle"]): CommandHandler {
  return { name, tryHandle: vi.fn(impl) };
}

describe("CommandDispatcher", () => {
  it("returns the first non-null response and skips later handlers", async () => {
    const miss = handler("miss", () => null);
    const hit = handler("hit", () => ({ x: 1 }));
    const later = handler("later", () => ({ y: 2 }));
    const dispatcher = new CommandDispatcher([miss, hit, later], fixedVersions);

    const response = await dispatcher.dispatch({ command: "anything" }, context);

    expect(response).toEqual({ x: 1, confirm: "CommandDispatcher TestServer/1.0 Runtime/9" });
    expect(miss.tryHandle).toHaveBeenCalledWith({ command: "anything" }, context);
    expect(later.tryHandle).not.toHaveBeenCalled();
  });

  it("awaits async handlers", async () => {
    const dispatcher = new CommandDispatcher(
      [handler("async", async () => ({ done: true }))],
      fixedVersions,
    );
    expect(await dispatcher.dispatch({}, context)).toEqual({
      done: true,
      confirm: "CommandDispatcher TestServer/1.0 Runtime/9",
    });
  });

  it("answers an unrecognized command with a copy plus failed: Unhandled.", async () => {
    const dispatcher = new CommandDispatcher([handler("miss", () => null)], fixedVersions);
    const command = { command: "spin", parameters: { speed: 3 } };

    const response = await dispatcher.dispatch(command, context);

    expect(response).toEqual({ command: "spin", parameters: { speed: 3 }, failed: UNHANDLED });
    expect(response).not.toHaveProperty("confirm");
    expect(command).toEqual({ command: "spin", parameters: { speed: 3 } });
  });

  it("treats an empty chain as a total miss", async () => {
    const dispatcher = new CommandDispatcher([]);
    expect(await dispatcher.dispatch({ a: 1 }, context)).toEqual({ a: 1, failed: "Unhandled." });
  });

  it("leaves responses that already carry failed or confirm alone", async () => {
    const failed = new CommandDispatcher([handler("f", () => ({ failed: "nope" }))], fixedVersions);
    const confirmed = new CommandDispatcher([handler("c", () => ({ confirm: "mine" }))], fixedVersions);

    expect(await failed.dispatch({}, context)).toEqual({ failed: "nope" });
    expect(await confirmed.dispatch({}, context)).toEqual({ confirm: "mine" });
  });

  it("does not mutate the handler's response object", async () => {
    const shared = { x: 1 };
    const dispatcher = new CommandDispatcher([handler("shared", () => shared)], fixedVersions);
    await dispatcher.dispatch({}, context);
    expect(shared).toEqual({ x: 1 });
  });

  it("names a subclass in the confirmation", async () => {
    class AppDispatcher extends CommandDispatcher {}
    const dispatcher = new AppDispatcher([handler("hit", () => ({}))], fixedVersions);
    expect(dispatcher.confirmation()).toBe("AppDispatcher TestServer/1.0 Runtime/9");
  });

  it("defaults to the harness and Node.js versions", () => {
    const dispatcher = new CommandDispatcher([]);
    expect(dispatcher.confirmation()).toBe(`CommandDispatcher WebViewHarness/0.1.0 Node.js/${process.version}`);
  });

  it("propagates a throwing handler as HandlerFaultError with the cause", async () => {
    const boom = new Error("boom");
    const dispatcher = new CommandDispatcher([
      handler("faulty", () => {
        throw boom;
      }),
      handler("never", () => ({ ok: true })),
    ]);

    const err = await dispatcher.dispatch({}, context).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(HandlerFaultError);
    expect(err).toMatchObject({ handler: "faulty", cause: boom, message: 'Handler "faulty" failed: boom' });
  });

  it("propagates a rejecting async handler", async () => {
    const dispatcher = new CommandDispatcher([
      handler("rejects", async () => {
        throw new Error("async boom");
      }),
    ]);
    await expect(dispatcher.dispatch({}, context)).rejects.toThrow('Handler "rejects" failed: async boom');
  });

  it("freezes the handler chain", () => {
    const dispatcher = new CommandDispatcher([handler("a", () => null)]);
    expect(Object.isFrozen(dispatcher.handlers)).toBe(true);
  });
});

describe("isCommandObject", () => {
  it("accepts plain objects only", () => {
    const values: [unknown, boolean][] = [
      [{}, true],
      [{ a: 1 }, true],
      [[], false],
      [null, false],
      ["text", false],
      [3, false],
    ];
    for (const [value, expected] of values) {
      expect(isCommandObject(value)).toBe(expected);
    }
  });

  it("narrows to a record", () => {
    const value: unknown = { command: "echo" };
    if (!isCommandObject(value)) throw new Error("expected an object");
    const command: CommandObject = value;
    expect(command.command).toBe("echo");
  });
});
