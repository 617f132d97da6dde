import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { execaCliInvokerFactory, prepareExpression } from "./execaCliInvoker.js";

const { execaMock, execaOptionsMock } = vi.hoisted(() => ({ execaMock: vi.fn(), execaOptionsMock: vi.fn() }));

vi.mock("execa", async importOriginal => {
  const actual = await importOriginal<typeof import("execa")>();
  return {
    ...actual,
    $: (options: unknown) => {
      execaOptionsMock(options);
      return execaMock;
    },
  };
});

describe("prepareExpression", () => {
  it("nullish becomes empty", () => expect(prepareExpression(undefined)).toBe(""));
  it("numbers pass through", () => expect(prepareExpression(22)).toBe(22));
  it("booleans become text", () => expect(prepareExpression(true)).toBe("true"));
  it("lists are flattened to text", () => expect(prepareExpression(["--scope", null, 1])).toStrictEqual(["--scope", "", 1]));
  it("objects use toString", () => expect(prepareExpression(new URL("https://10.0.0.6:25555"))).toBe("https://10.0.0.6:25555/"));
});

describe("execa cli invoker", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes the command and parses json output", async () => {
    execaMock.mockResolvedValueOnce({ stdout: '{"name":"banana-group"}', stderr: "" });
    const invoker = execaCliInvokerFactory({ commandPrefix: "az" });

    const result = await invoker.strict<{ name: string }>`group show --name ${"banana-group"}`;

    expect(result).toStrictEqual({ name: "banana-group" });
    expect([...execaMock.mock.calls[0][0]]).toStrictEqual(["az group show --name ", ""]);
    expect(execaMock.mock.calls[0][1]).toBe("banana-group");
  });

  it("forwards stderr as a warning", async () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    execaMock.mockResolvedValueOnce({ stdout: "{}", stderr: "some warning" });
    const invoker = execaCliInvokerFactory({ commandPrefix: "terraform" });

    await invoker.strict`output -json`;

    expect(warnSpy).toHaveBeenCalledExactlyOnceWith("some warning");
  });

  it("rejects blank strict output", async () => {
    execaMock.mockResolvedValueOnce({ stdout: "", stderr: "" });
    const invoker = execaCliInvokerFactory({});

    await expect(invoker.strict`az group delete --yes --name ${"banana-group"}`).rejects.toThrow(
      "Resulting stream was empty",
    );
  });

  it("propagates invocation failures", async () => {
    const failure = new Error("spawn az ENOENT");
    execaMock.mockRejectedValueOnce(failure);
    const invoker = execaCliInvokerFactory({ commandPrefix: "az" });

    await expect(invoker.strict`group show --name ${"banana-group"}`).rejects.toBe(failure);
  });

  it("asks az for quiet json output", () => {
    execaCliInvokerFactory({ commandPrefix: "az", env: { AZURE_CONFIG_DIR: "/tmp/az", AZURE_CORE_OUTPUT: "table" } });

    expect(execaOptionsMock).toHaveBeenCalledOnce();
    expect(execaOptionsMock.mock.calls[0][0]).toMatchObject({
      env: {
        AZURE_CONFIG_DIR: "/tmp/az",
        AZURE_CORE_OUTPUT: "json",
        AZURE_CORE_ONLY_SHOW_ERRORS: "true",
        AZURE_CORE_DISABLE_PROGRESS_BAR: "true",
        AZURE_CORE_NO_COLOR: "true",
        AZURE_CORE_LOGIN_EXPERIENCE_V2: "off",
      },
    });
  });

  it("leaves the environment of other tools alone", () => {
    const env = { TF_IN_AUTOMATION: "1" };
    execaCliInvokerFactory({ commandPrefix: "terraform", env, cwd: "/tmp/state" });

    expect(execaOptionsMock.mock.calls[0][0]).toMatchObject({ env: { TF_IN_AUTOMATION: "1" }, cwd: "/tmp/state" });
    expect(execaOptionsMock.mock.calls[0][0].env).toStrictEqual(env);
  });
});
