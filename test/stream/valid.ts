import { jsonFeedParse } from "../../src/index";
import { assertEq, assertSubset, checkError, formatEvents, SCALAR_OPTION } from "../_util";

describe("valid documents", () => {
  test("object", () => {
    assertEq(formatEvents(jsonFeedParse("{}")), ["start_object", "end_object", "eof"]);
    assertEq(formatEvents(jsonFeedParse('{"name": "Elvis"}')), [
      "start_object",
      "field_name:name",
      "value_string:Elvis",
      "end_object",
      "eof",
    ]);
  });

  test("array", () => {
    assertEq(formatEvents(jsonFeedParse("[]")), ["start_array", "end_array", "eof"]);
    assertEq(formatEvents(jsonFeedParse('["Elvis", "Max"]')), [
      "start_array",
      "value_string:Elvis",
      "value_string:Max",
      "end_array",
      "eof",
    ]);
    assertEq(formatEvents(jsonFeedParse('["Elvis", 132, "Max", 80.67]')), [
      "start_array",
      "value_string:Elvis",
      "value_int:132",
      "value_string:Max",
      "value_double:80.67",
      "end_array",
      "eof",
    ]);
  });

  test("nesting", () => {
    assertEq(formatEvents(jsonFeedParse('{"a":[true,false,null],"b":{"c":-0.5e+3},"d":[[],{}]}')), [
      "start_object",
      "field_name:a",
      "start_array",
      "value_true",
      "value_false",
      "value_null",
      "end_array",
      "field_name:b",
      "start_object",
      "field_name:c",
      "value_double:-0.5e+3",
      "end_object",
      "field_name:d",
      "start_array",
      "start_array",
      "end_array",
      "start_object",
      "end_object",
      "end_array",
      "end_object",
      "eof",
    ]);
  });

  test("whitespace", () => {
    assertEq(formatEvents(jsonFeedParse(' \t\r\n{ "a" : 1 , "b" : [ ] }\n')), [
      "start_object",
      "field_name:a",
      "value_int:1",
      "field_name:b",
      "start_array",
      "end_array",
      "end_object",
      "eof",
    ]);
  });

  test("top-level scalar", () => {
    for (const input of ["12", " true ", '"x"', "null"])
      assertSubset(checkError(input), { kind: "structure", reason: "JSON text must be an object or array" }, input);
    assertSubset(checkError('"A JSON payload should be an object or array, not a string."'), {
      byte: 0x22,
      position: 0,
    });

    assertEq(formatEvents(jsonFeedParse("12", SCALAR_OPTION)), ["value_int:12", "eof"]);
    assertEq(formatEvents(jsonFeedParse(" true ", SCALAR_OPTION)), ["value_true", "eof"]);
    assertEq(formatEvents(jsonFeedParse('"x"', SCALAR_OPTION)), ["value_string:x", "eof"]);
    assertEq(formatEvents(jsonFeedParse("null", SCALAR_OPTION)), ["value_null", "eof"]);
  });
});
