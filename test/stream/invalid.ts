import { checkValid, feedInChunks } from "../_util";

const DEEP = '[[[[[[[[[[[[[[[[[["nested too deep"]]]]]]]]]]]]]]]]]]';

const FAILED_LIST = [
  `"A JSON payload should be an object or array, not a string."`,
  `[1,]`,
  `{`,
  `{name: "unquoted key"}`,
  `01`,
  `NaN`,
  `["never closed"`,
  `{"value": 1} "then more"`,
  `{"sum": 1 + 2}`,
  `{"call": run()}`,
  `{"hex": 0x1F}`,
  `["bad escape \\x41"]`,
  `[\\u0041]`,
  `["octal escape \\012"]`,
  DEEP,
  `{"no colon" true}`,
  `{"two colons":: 1}`,
  `{"comma for colon", 1}`,
  `["colon for comma": 1]`,
  `["bad literal", tru]`,
  `['single quotes']`,
  `["raw\ttab"]`,
  `["raw
newline"]`,
  `["escaped\\
newline"]`,
  `[1e]`,
  `[1e+]`,
  `[1e-+2]`,
  `{"open": true,`,
  `["mismatch"}`,
  `["two commas",,]`,
  `[ , "missing first"]`,
  `["comma after close"],`,
  `["extra close"]]`,
];

describe("invalid input", () => {
  test("corpus", () => {
    if (FAILED_LIST.length !== 33) throw new Error(`expected 33 inputs, got ${FAILED_LIST.length}`);
    for (const input of FAILED_LIST) {
      for (const sizes of [[1], [4], [1024]]) {
        const events = feedInChunks(input, sizes, { maxDepth: 16 });
        if (events[events.length - 1].type !== "error" || events.some((event) => event.type === "eof")) {
          console.log(input);
          throw new Error("expected error, but got nothing");
        }
      }
    }
  });

  test("depth only", () => {
    checkValid(DEEP);
  });
});
