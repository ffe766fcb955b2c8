import { jsonFeedParse } from "../../src/index";
import { assertEq, assertSubset, checkError, feedInChunks, formatEvents, SCALAR_OPTION } from "../_util";

const option = { acceptMultipleValues: true, acceptTopLevelScalar: true };

describe("multiple values", () => {
  test("separated by whitespace", () => {
    assertEq(formatEvents(jsonFeedParse('{"a":1} [2] 3 "x" true', option)), [
      "start_object",
      "field_name:a",
      "value_int:1",
      "end_object",
      "start_array",
      "value_int:2",
      "end_array",
      "value_int:3",
      "value_string:x",
      "value_true",
      "eof",
    ]);
    assertEq(formatEvents(jsonFeedParse("1 2", option)), ["value_int:1", "value_int:2", "eof"]);
  });

  test("adjacent", () => {
    assertEq(formatEvents(jsonFeedParse("[1][2]", option)), [
      "start_array",
      "value_int:1",
      "end_array",
      "start_array",
      "value_int:2",
      "end_array",
      "eof",
    ]);
    assertEq(formatEvents(jsonFeedParse("truefalse", option)), ["value_true", "value_false", "eof"]);
  });

  test("number followed by a value", () => {
    assertEq(formatEvents(jsonFeedParse("1[2]", option)), [
      "value_int:1",
      "start_array",
      "value_int:2",
      "end_array",
      "eof",
    ]);
    assertEq(formatEvents(jsonFeedParse('-1.5{}"a"', option)), [
      "value_double:-1.5",
      "start_object",
      "end_object",
      "value_string:a",
      "eof",
    ]);
    for (const size of [1, 2]) {
      assertEq(formatEvents(feedInChunks('1"a"', [size], option)), ["value_int:1", "value_string:a", "eof"], size);
    }

    assertSubset(checkError("1true", option), { reason: "unexpected character in number", position: 1 });
    assertSubset(checkError("[1[2]]", option), { reason: "unexpected character in number", position: 2 });
    assertSubset(checkError("1[2]", SCALAR_OPTION), { reason: "unexpected character in number", position: 1 });
  });

  test("scalars need their own option", () => {
    const reason = "JSON text must be an object or array";
    assertSubset(checkError("[1] 2", { acceptMultipleValues: true }), { reason, position: 4 });
    assertEq(formatEvents(jsonFeedParse("[1]{}", { acceptMultipleValues: true })), [
      "start_array",
      "value_int:1",
      "end_array",
      "start_object",
      "end_object",
      "eof",
    ]);
  });

  test("newline delimited", () => {
    const input = '{"n":1}\n{"n":2}\n';
    const expected = [
      "start_object",
      "field_name:n",
      "value_int:1",
      "end_object",
      "start_object",
      "field_name:n",
      "value_int:2",
      "end_object",
      "eof",
    ];
    assertEq(formatEvents(jsonFeedParse(input, option)), expected);
    for (const size of [1, 3]) assertEq(formatEvents(feedInChunks(input, [size], option)), expected, size);
  });

  test("errors", () => {
    assertSubset(checkError("1 2", SCALAR_OPTION), {
      kind: "trailing",
      reason: "unexpected non-whitespace character after end of JSON",
      position: 2,
    });
    assertSubset(checkError('"a""b"', SCALAR_OPTION), { kind: "trailing", position: 3 });

    assertSubset(checkError("", option), { reason: "no JSON value in input" });
    assertSubset(checkError("  ", option), { reason: "no JSON value in input" });
    assertSubset(checkError("[1] ]", option), { reason: "wrong bracket", position: 4 });
    assertSubset(checkError("[1] [", option), { reason: "structure broken because of EOF", position: 5 });
  });
});
