import { describe, expect, test } from "vitest";
import {
  FlowBuilder,
  FlowError,
  withTimeout,
  type FlowHooks,
  type StepMeta,
} from "../src";

// ─────────────────────────────────────────────────────────────────────────────
// then
// ─────────────────────────────────────────────────────────────────────────────

describe("then", () => {
  test("executes steps in order", async () => {
    const order: number[] = [];
    await new FlowBuilder()
      .then(async () => {
        order.push(1);
      })
      .then(async () => {
        order.push(2);
      })
      .then(() => {
        order.push(3);
      })
      .run({});
    expect(order).toEqual([1, 2, 3]);
  });

  test("mutates shared state across steps", async () => {
    const s = { count: 0 };
    await new FlowBuilder<typeof s>()
      .then((s) => {
        s.count += 1;
      })
      .then((s) => {
        s.count += 1;
      })
      .run(s);
    expect(s.count).toBe(2);
  });

  test("passes params to every step", async () => {
    const seen: unknown[] = [];
    await new FlowBuilder<object, { turn: string }>()
      .then((_s, p) => {
        seen.push(p.turn);
      })
      .then((_s, p) => {
        seen.push(p.turn);
      })
      .run({}, { turn: "t-1" });
    expect(seen).toEqual(["t-1", "t-1"]);
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// branch
// ─────────────────────────────────────────────────────────────────────────────

describe("branch", () => {
  test("routes to the matching key", async () => {
    const s = { route: "web", hit: "" };
    await new FlowBuilder<typeof s>()
      .branch((s) => s.route, {
        web: (s) => {
          s.hit = "web";
        },
        weather: (s) => {
          s.hit = "weather";
        },
      })
      .run(s);
    expect(s.hit).toBe("web");
  });

  test("falls through to default when no key matches", async () => {
    const s = { hit: "" };
    await new FlowBuilder<typeof s>()
      .branch(() => "nope", {
        default: (s) => {
          s.hit = "default";
        },
      })
      .run(s);
    expect(s.hit).toBe("default");
  });

  test("an unmatched key without default is a no-op and the chain continues", async () => {
    const order: string[] = [];
    await new FlowBuilder()
      .branch(() => "skip", {
        run: () => {
          order.push("run");
        },
      })
      .then(() => {
        order.push("after");
      })
      .run({});
    expect(order).toEqual(["after"]);
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// parallel
// ─────────────────────────────────────────────────────────────────────────────

describe("parallel", () => {
  test("all fns complete before the next step", async () => {
    const s: { done: string[]; after: string[] } = { done: [], after: [] };
    await new FlowBuilder<typeof s>()
      .parallel([
        async (s) => {
          await new Promise((r) => setTimeout(r, 15));
          s.done.push("slow");
        },
        (s) => {
          s.done.push("fast");
        },
      ])
      .then((s) => {
        s.after = [...s.done];
      })
      .run(s);
    expect(s.after).toEqual(["fast", "slow"]);
  });

  test("without settle, one failure fails the step", async () => {
    const flow = new FlowBuilder().parallel([
      () => {},
      () => {
        throw new Error("boom");
      },
    ]);
    await expect(flow.run({})).rejects.toThrow("Flow failed at parallel (step 0): boom");
  });

  test("settle tolerates failures and reports each through onError", async () => {
    const s = { ok: false };
    const failures: { fnIndex?: number; message: string }[] = [];
    const hooks: FlowHooks<typeof s> = {
      onError: (meta, err) => {
        failures.push({
          fnIndex: meta.fnIndex,
          message: err instanceof Error ? err.message : String(err),
        });
      },
    };
    await new FlowBuilder<typeof s>()
      .use(hooks)
      .parallel(
        [
          () => {
            throw new Error("first");
          },
          (s) => {
            s.ok = true;
          },
          async () => {
            throw new Error("third");
          },
        ],
        { settle: true },
      )
      .run(s);
    expect(s.ok).toBe(true);
    expect(failures).toEqual([
      { fnIndex: 0, message: "first" },
      { fnIndex: 2, message: "third" },
    ]);
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// errors
// ─────────────────────────────────────────────────────────────────────────────

describe("FlowError", () => {
  test("wraps plain step errors with index label", async () => {
    const flow = new FlowBuilder()
      .then(() => {})
      .then(() => {
        throw new Error("bad");
      });
    const err = await flow.run({}).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(FlowError);
    if (!(err instanceof FlowError)) return;
    expect(err.step).toBe("step 1");
    expect(err.message).toBe("Flow failed at step 1: bad");
    expect(err.cause).toBeInstanceOf(Error);
  });

  test("uses the step label when there is one", async () => {
    const flow = new FlowBuilder().then(
      () => {
        throw new Error("down");
      },
      { label: "get_weather" },
    );
    await expect(flow.run({})).rejects.toThrow('Flow failed at "get_weather" (step 0): down');
  });

  test("does not double-wrap FlowErrors", async () => {
    const inner = new FlowBuilder().then(() => {
      throw new Error("inner");
    });
    const outer = new FlowBuilder()
      .then(() => {})
      .then(() => inner.run({}));
    await expect(outer.run({})).rejects.toThrow("Flow failed at step 0: inner");
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// hooks
// ─────────────────────────────────────────────────────────────────────────────

describe("hooks", () => {
  test("fire in lifecycle order with step metadata", async () => {
    const events: string[] = [];
    const metas: StepMeta[] = [];
    await new FlowBuilder()
      .use({
        beforeFlow: () => {
          events.push("beforeFlow");
        },
        beforeStep: (meta) => {
          events.push(`before:${meta.index}`);
          metas.push(meta);
        },
        afterStep: (meta) => {
          events.push(`after:${meta.index}`);
        },
        afterFlow: () => {
          events.push("afterFlow");
        },
      })
      .then(() => {}, { label: "first" })
      .branch(() => undefined, {})
      .run({});
    expect(events).toEqual([
      "beforeFlow",
      "before:0",
      "after:0",
      "before:1",
      "after:1",
      "afterFlow",
    ]);
    expect(metas).toEqual([
      { index: 0, type: "fn", label: "first" },
      { index: 1, type: "branch", label: undefined },
    ]);
  });

  test("wrapStep composes around the step body", async () => {
    const events: string[] = [];
    await new FlowBuilder()
      .use({
        wrapStep: async (_m, next) => {
          events.push("outer-in");
          await next();
          events.push("outer-out");
        },
      })
      .use({
        wrapStep: async (_m, next) => {
          events.push("inner-in");
          await next();
          events.push("inner-out");
        },
      })
      .then(() => {
        events.push("body");
      })
      .run({});
    expect(events).toEqual(["outer-in", "inner-in", "body", "inner-out", "outer-out"]);
  });

  test("afterFlow fires even when the flow throws", async () => {
    let fired = false;
    const flow = new FlowBuilder()
      .use({
        afterFlow: () => {
          fired = true;
        },
      })
      .then(() => {
        throw new Error("x");
      });
    await expect(flow.run({})).rejects.toThrow(FlowError);
    expect(fired).toBe(true);
  });

  test("hooks belong to one instance only", async () => {
    let calls = 0;
    const hooked = new FlowBuilder().use({
      beforeStep: () => {
        calls++;
      },
    });
    await hooked.then(() => {}).run({});
    await new FlowBuilder().then(() => {}).run({});
    expect(calls).toBe(1);
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// timeouts & cancellation
// ─────────────────────────────────────────────────────────────────────────────

describe("withTimeout", () => {
  test("withTimeout resolves with the value or rejects with TimeoutError", async () => {
    await expect(withTimeout(100, async () => 42)).resolves.toBe(42);
    await expect(
      withTimeout(10, () => new Promise((r) => setTimeout(r, 200)), "capability get_weather"),
    ).rejects.toThrow("capability get_weather timed out after 10ms");
  });
});

describe("AbortSignal", () => {
  test("aborts before the first step when the signal is already aborted", async () => {
    let ran = false;
    const controller = new AbortController();
    controller.abort();
    const flow = new FlowBuilder().then(() => {
      ran = true;
    });
    await expect(flow.run({}, undefined, { signal: controller.signal })).rejects.toThrow();
    expect(ran).toBe(false);
  });

  test("aborts between steps", async () => {
    const order: number[] = [];
    const controller = new AbortController();
    const flow = new FlowBuilder()
      .then(() => {
        order.push(1);
        controller.abort();
      })
      .then(() => {
        order.push(2);
      });
    await expect(flow.run({}, undefined, { signal: controller.signal })).rejects.toThrow();
    expect(order).toEqual([1]);
  });
});
