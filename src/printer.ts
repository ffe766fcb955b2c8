import { JsonParserError } from "./parser/base";
import { JsonEvent } from "./parser/event";

export class JsonPrinterError extends JsonParserError {
  constructor(msg: string) {
    super(msg);
    this.name = "JsonPrinterError";
  }
}

export type JsonPrettyPrinterOption = {
  /**
   * indentation of one nesting level
   * @default "  "
   */
  indent?: string;
};

/**
 * Rebuild JSON text from parser events.
 *
 * Strings are escaped again, numbers keep their literal text, several top-level values are
 * separated by new lines.
 */
export interface JsonPrettyPrinter {
  onEvent(event: JsonEvent): void;
  getResult(): string;
}

export const createJsonPrettyPrinter = (option?: JsonPrettyPrinterOption): JsonPrettyPrinter => {
  const indent = option?.indent ?? "  ";
  const _out: string[] = [];
  /* number of members written, per open array/object */
  const _stack: number[] = [];
  let _afterKey = false;

  const _newLine = () => {
    _out.push("\n", indent.repeat(_stack.length));
  };
  const _beforeMember = () => {
    if (_afterKey) {
      _afterKey = false;
      return;
    }
    const n = _stack.length;
    if (n === 0) {
      if (_out.length !== 0) _out.push("\n");
      return;
    }
    if (_stack[n - 1]++ !== 0) _out.push(",");
    _newLine();
  };
  const _endStruct = (bracket: string) => {
    const members = _stack.pop();
    if (members === undefined) throw new JsonPrinterError(`unbalanced '${bracket}'`);
    if (members !== 0) _newLine();
    _out.push(bracket);
  };

  return {
    onEvent(event: JsonEvent) {
      switch (event.type) {
        case "start_object":
          _beforeMember();
          _out.push("{");
          _stack.push(0);
          return;
        case "start_array":
          _beforeMember();
          _out.push("[");
          _stack.push(0);
          return;
        case "end_object":
          return _endStruct("}");
        case "end_array":
          return _endStruct("]");
        case "field_name":
          _beforeMember();
          _out.push(JSON.stringify(event.value), ": ");
          _afterKey = true;
          return;
        case "value_string":
          _beforeMember();
          _out.push(JSON.stringify(event.value));
          return;
        case "value_int":
        case "value_double":
          _beforeMember();
          _out.push(event.value);
          return;
        case "value_true":
          _beforeMember();
          _out.push("true");
          return;
        case "value_false":
          _beforeMember();
          _out.push("false");
          return;
        case "value_null":
          _beforeMember();
          _out.push("null");
          return;
        case "error":
          throw new JsonPrinterError(`cannot print invalid JSON: ${event.error.message}`);
        default:
        /* need_more_input, eof */
      }
    },
    getResult() {
      return _out.join("");
    },
  };
};
