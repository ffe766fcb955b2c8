import { JsonFeedParserError, JsonParserError, parseJsonInteger, parseJsonNumber } from "./base";

namespace EventInfo {
  export type _NeedMoreInput = { readonly type: "need_more_input" };
  export type _Error = { readonly type: "error"; readonly error: JsonFeedParserError };
  export type _Eof = { readonly type: "eof" };

  export type _StartObject = { readonly type: "start_object" };
  export type _EndObject = { readonly type: "end_object" };
  export type _StartArray = { readonly type: "start_array" };
  export type _EndArray = { readonly type: "end_array" };
  export type _True = { readonly type: "value_true" };
  export type _False = { readonly type: "value_false" };
  export type _Null = { readonly type: "value_null" };

  /** `value` is the decoded key */
  export type _FieldName = { readonly type: "field_name"; readonly value: string };
  /** `value` is the decoded string */
  export type _String = { readonly type: "value_string"; readonly value: string };
  /** `value` is the literal text of the number */
  export type _Int = { readonly type: "value_int"; readonly value: string };
  /** `value` is the literal text of the number */
  export type _Double = { readonly type: "value_double"; readonly value: string };
}

export type JsonControlEvent = EventInfo._NeedMoreInput | EventInfo._Error | EventInfo._Eof;
export type JsonTerminalEvent = EventInfo._Error | EventInfo._Eof;
export type JsonStructuralEvent =
  | EventInfo._StartObject
  | EventInfo._EndObject
  | EventInfo._StartArray
  | EventInfo._EndArray
  | EventInfo._True
  | EventInfo._False
  | EventInfo._Null;
export type JsonPayloadEvent = EventInfo._FieldName | EventInfo._String | EventInfo._Int | EventInfo._Double;

/**
 * Everything `JsonFeedParser.nextEvent` may return.
 *
 * Only `field_name`, `value_string`, `value_int` and `value_double` carry a `value`.
 */
export type JsonEvent = JsonControlEvent | JsonStructuralEvent | JsonPayloadEvent;
export type JsonEventType = JsonEvent["type"];
export type JsonNumberEvent = EventInfo._Int | EventInfo._Double;

export const EVENT_NEED_MORE_INPUT: EventInfo._NeedMoreInput = Object.freeze({ type: "need_more_input" });
export const EVENT_EOF: EventInfo._Eof = Object.freeze({ type: "eof" });
export const EVENT_START_OBJECT: EventInfo._StartObject = Object.freeze({ type: "start_object" });
export const EVENT_END_OBJECT: EventInfo._EndObject = Object.freeze({ type: "end_object" });
export const EVENT_START_ARRAY: EventInfo._StartArray = Object.freeze({ type: "start_array" });
export const EVENT_END_ARRAY: EventInfo._EndArray = Object.freeze({ type: "end_array" });
export const EVENT_TRUE: EventInfo._True = Object.freeze({ type: "value_true" });
export const EVENT_FALSE: EventInfo._False = Object.freeze({ type: "value_false" });
export const EVENT_NULL: EventInfo._Null = Object.freeze({ type: "value_null" });

export const isJsonPayloadEvent = (event: JsonEvent): event is JsonPayloadEvent =>
  event.type === "field_name" ||
  event.type === "value_string" ||
  event.type === "value_int" ||
  event.type === "value_double";
export const isJsonTerminalEvent = (event: JsonEvent): event is JsonTerminalEvent =>
  event.type === "error" || event.type === "eof";

export const jsonEventNumber = (event: JsonNumberEvent): number => parseJsonNumber(event.value);
/** `value_int` only; `value_double` has no exact integer form */
export const jsonEventInteger = (event: EventInfo._Int): bigint => {
  const val = parseJsonInteger(event.value);
  if (val === undefined) throw new JsonParserError(`invalid integer: ${event.value}`);
  return val;
};
