import { describe, expect, it } from "vitest";

import { parseRecord } from "../record/parse-record.js";
import { DEFAULT_RENDER_OPTIONS, renderRecord, type RenderOptions } from "./render-record.js";
import { linesText } from "./segments.js";

function render(line: string, options: Partial<RenderOptions> = {}): string {
  return linesText(renderRecord(parseRecord(line), { ...DEFAULT_RENDER_OPTIONS, ...options }));
}

describe("renderRecord", () => {
  it("renders timestamp, padded level and message on one line", () => {
    expect(
      render('{"timestamp":1729811012050,"level":"WARN","message":"hello there"}'),
    ).toBe("2024-10-24T23:03:32.050Z WARN  hello there");
  });

  it("moves long text below the main line", () => {
    expect(
      render(
        '{"level":"TRACE","message":"a message","stacktrace":"foo\\nbar\\nblah","prop":"interestingProperty","something":"info"}',
      ),
    ).toBe(
      [
        "TRACE a message prop=interestingProperty something=info",
        "  stacktrace:",
        "    foo",
        "    bar",
        "    blah",
      ].join("\n"),
    );
  });

  it("passes non-JSON and non-object lines through unchanged", () => {
    expect(render("not json at all")).toBe("not json at all");
    expect(render("  [1, 2]  ")).toBe("  [1, 2]  ");
    expect(renderRecord(parseRecord("oops"))).toEqual([[{ role: "unrecognized", text: "oops" }]]);
    expect(renderRecord(parseRecord("42"))).toEqual([[{ role: "plain", text: "42" }]]);
  });

  it("expands nested objects into indented blocks", () => {
    expect(
      render(
        '{"level":"info","msg":"req","user":{"id":7,"tags":["a","b"],"address":{"city":"Oslo"}},"status":200}',
      ),
    ).toBe(
      [
        "info  req status=200",
        "  user:",
        "    id=7",
        "    tags:",
        "      [0]=a",
        "      [1]=b",
        "    address:",
        "      city=Oslo",
      ].join("\n"),
    );
  });

  it("keeps flat containers inline", () => {
    expect(render('{"msg":"x","ctx":{"a":1,"b":"two words"},"ids":[1,2],"e":{},"f":[]}')).toBe(
      'x ctx={a=1 b="two words"} ids=[1 2] e={} f=[]',
    );
  });

  it("prints scalar values by type", () => {
    expect(render('{"msg":"m","n":1.50,"ok":true,"none":null,"s":""}')).toBe(
      'm n=1.50 ok=true none=null s=""',
    );
  });

  it("renders an empty object as an empty line", () => {
    expect(renderRecord(parseRecord("{}"))).toEqual([[]]);
    expect(render("{}")).toBe("");
  });

  it("omits an empty main line when blocks follow", () => {
    expect(render('{"a":{"b":{"c":1}}}')).toBe("  a:\n    b:\n      c=1");
    expect(render('{"trace":"a\\nb\\n"}')).toBe("  trace:\n    a\n    b");
  });

  it("shows a level alone without padding", () => {
    expect(render('{"level":"warn"}')).toBe("warn");
    expect(render('{"time":"noon","level":"ok"}')).toBe("noon ok");
  });

  it("keeps an empty message visible as a field", () => {
    expect(render('{"level":"info","msg":"","port":80}')).toBe('info  msg="" port=80');
    expect(render('{"msg":""}')).toBe('msg=""');
  });

  it("pads non-string levels to the level column", () => {
    expect(render('{"level":30,"msg":"x"}')).toBe("30    x");
  });

  it("continues a multi-line message below the main line", () => {
    expect(render('{"level":"error","message":"boom\\ncause: x\\n","code":5}')).toBe(
      "error boom code=5\n  cause: x",
    );
  });

  it("renders multi-line strings inside blocks verbatim", () => {
    expect(render('{"err":{"stack":"l1\\nl2","code":5}}')).toBe(
      "  err:\n    stack:\n      l1\n      l2\n    code=5",
    );
  });

  it("puts large fields before long text, each in source order", () => {
    expect(render('{"note":"a\\nb","x":{"y":[1]},"z":1}')).toBe(
      "z=1\n  x:\n    y:\n      [0]=1\n  note:\n    a\n    b",
    );
  });

  it("uses the configured indent width", () => {
    expect(render('{"a":{"b":{"c":1}}}', { indent: 4 })).toBe(
      "    a:\n        b:\n            c=1",
    );
  });

  it("uses configured candidate keys and timestamp format", () => {
    expect(
      render('{"when":1700000000,"sev":"debug","text":"hi","level":"x"}', {
        candidates: { timestamp: ["when"], level: ["sev"], message: ["text"] },
        timestampFormat: "raw",
      }),
    ).toBe("1700000000 debug hi level=x");
  });

  it("keeps duplicate keys at their first position with the last value", () => {
    expect(render('{"msg":"m","a":1,"b":2,"a":3}')).toBe("m a=3 b=2");
  });

  it("emits typed segments for styling", () => {
    expect(renderRecord(parseRecord('{"level":"warn","msg":"m","k":1}'))).toEqual([
      [
        { role: "level", text: "warn", severity: "WARN" },
        { role: "plain", text: " " },
        { role: "plain", text: " " },
        { role: "message", text: "m" },
        { role: "plain", text: " " },
        { role: "key", text: "k", depth: 0 },
        { role: "punctuation", text: "=" },
        { role: "number", text: "1" },
      ],
    ]);
  });

  it("renders very deep nesting without overflowing the stack", () => {
    const depth = 20_000;
    const line = `{"root":${'{"n":'.repeat(depth)}1${"}".repeat(depth)}}`;
    const lines = renderRecord(parseRecord(line), { ...DEFAULT_RENDER_OPTIONS, indent: 1 });
    expect(lines).toHaveLength(depth + 1);
    expect(linesText(lines.slice(-1))).toBe(`${" ".repeat(depth + 1)}n=1`);
  });
});
