import { describe, it, expect, vi } from "vitest";
import { ResourceStack } from "../mcp/resourceStack";

describe("ResourceStack", () => {
  it("releases in reverse order of acquisition", async () => {
    const order: string[] = [];
    const stack = new ResourceStack();
    stack.defer("transport", async () => { order.push("transport"); });
    stack.defer("client", async () => { order.push("client"); });

    const failures = await stack.close();

    expect(order).toEqual(["client", "transport"]);
    expect(failures).toEqual([]);
    expect(stack.size).toBe(0);
  });

  it("keeps releasing after a failure and reports it", async () => {
    const transport = vi.fn().mockResolvedValue(undefined);
    const stack = new ResourceStack();
    stack.defer("transport", transport);
    stack.defer("client", () => Promise.reject(new Error("already closed")));

    const failures = await stack.close();

    expect(transport).toHaveBeenCalledTimes(1);
    expect(failures).toHaveLength(1);
    expect(failures[0].label).toBe("client");
  });

  it("is a no-op the second time", async () => {
    const release = vi.fn().mockResolvedValue(undefined);
    const stack = new ResourceStack();
    stack.defer("client", release);

    await stack.close();
    await stack.close();

    expect(release).toHaveBeenCalledTimes(1);
  });
});
