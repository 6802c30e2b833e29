import {
  isErrorReply,
  isTerminalState,
  isTextPart,
  textOf,
  textsOf,
  type Part,
  type TaskState,
} from "../src/a2a/types";

describe("A2A type guards", () => {
  it("detects text parts", () => {
    expect(isTextPart({ kind: "text", text: "hi" })).toBe(true);
    expect(isTextPart({ kind: "data", data: {} })).toBe(false);
  });

});

describe("isErrorReply", () => {
  it("accepts replies carrying an error object", () => {
    expect(
      isErrorReply({ jsonrpc: "2.0", id: "req-1", error: { code: -32001, message: "Task not found" } }),
    ).toBe(true);
  });

  it("rejects success replies", () => {
    expect(isErrorReply({ result: { ok: true } })).toBe(false);
  });

  it("rejects replies whose error is null", () => {
    expect(isErrorReply(JSON.parse('{"jsonrpc":"2.0","id":"req-1","error":null,"result":{}}'))).toBe(
      false,
    );
  });
});

describe("text helpers", () => {
  const parts: Part[] = [
    { kind: "text", text: "Once" },
    { kind: "data", data: { skip: true } },
    { kind: "text", text: "upon" },
  ];

  it("collects text parts in order", () => {
    expect(textsOf(parts)).toEqual(["Once", "upon"]);
  });

  it("joins with a space unless told otherwise", () => {
    expect(textOf(parts)).toBe("Once upon");
    expect(textOf(parts, "")).toBe("Onceupon");
  });
});

describe("isTerminalState", () => {
  it.each<TaskState>(["completed", "failed", "canceled"])("treats %s as terminal", (state) => {
    expect(isTerminalState(state)).toBe(true);
  });

  it.each<TaskState>(["submitted", "working", "input-required"])(
    "keeps polling while %s",
    (state) => {
      expect(isTerminalState(state)).toBe(false);
    },
  );
});
