import {
  DEFAULT_FEEDER_CAPACITY,
  DEFAULT_MAX_DEPTH,
  JsonFeedParserError,
  JsonFeedParserErrorKind,
  JsonFeedParserOption,
  JsonParserError,
  toJsonBytes,
} from "./base";
import {
  EVENT_END_ARRAY,
  EVENT_END_OBJECT,
  EVENT_EOF,
  EVENT_FALSE,
  EVENT_NEED_MORE_INPUT,
  EVENT_NULL,
  EVENT_START_ARRAY,
  EVENT_START_OBJECT,
  EVENT_TRUE,
  isJsonPayloadEvent,
  isJsonTerminalEvent,
  JsonEvent,
  JsonNumberEvent,
  JsonStructuralEvent,
  JsonTerminalEvent,
} from "./event";
import { createJsonFeeder, JsonFeeder } from "./feeder";

/* <SP>, <TAB>, <LF>, <CR> */
const isWhitespace = (c: number) => c === 0x20 || c === 0x09 || c === 0x0a || c === 0x0d;
const isDigit = (c: number) => c >= 0x30 && c <= 0x39;
const isNumberSeparator = (c: number) => isWhitespace(c) || c === 0x2c || c === 0x5d || c === 0x7d;
/* [ { " */
const isRootStart = (c: number) => c === 0x5b || c === 0x7b || c === 0x22;
const hexValue = (c: number) => {
  if (isDigit(c)) return c - 0x30;
  const lower = c | 0x20;
  if (lower >= 0x61 && lower <= 0x66) return lower - 0x57;
  return -1;
};

const ESCAPE_TABLE: Record<string, string | undefined> = {
  '"': '"',
  "\\": "\\",
  "/": "/",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t",
};

const enum ValueState {
  EMPTY,
  NULL,
  TRUE,
  FALSE,
  STRING,
  STRING_UTF8, // inside a multi-byte UTF-8 sequence
  STRING_ESCAPE,
  STRING_UNICODE,
  STRING_SURROGATE, // expects '\' of the low surrogate
  STRING_SURROGATE_ESCAPE, // expects 'u' of the low surrogate
  NUMBER,
  NUMBER_FRACTION,
  NUMBER_EXPONENT,
}

const enum LocationState {
  ROOT_START,
  KEY_FIRST_START, // used to check trailing comma
  KEY_START,
  VALUE_START,
  ELEMENT_FIRST_START, // used to check trailing comma
  ELEMENT_START,

  ROOT_END,
  KEY_END,
  VALUE_END,
  ELEMENT_END,
}

const NEXT_STATE_TABLE: LocationState[] = [
  LocationState.ROOT_END,
  LocationState.KEY_END,
  LocationState.KEY_END,
  LocationState.VALUE_END,
  LocationState.ELEMENT_END,
  LocationState.ELEMENT_END,
];

// << structure >>
const Err_BadPropertyNameInObject = "property name must be a string";
const Err_EmptyInput = "no JSON value in input";
const Err_EmptyValueInObject = "unexpected empty value in object";
const Err_Eof = "structure broken because of EOF";
const Err_ExpectedColon = "colon expected between property name and value";
const Err_ExpectedComma = "comma expected between values";
const Err_ExpectedRootStructure = "JSON text must be an object or array";
const Err_MissingValue = "missing value before comma";
const Err_RepeatedColon = "repeated colon not allowed";
const Err_TrailingCommaForbidden = "trailing comma not allowed";
const Err_Unexpected = "unexpected character";
const Err_WrongBracket = "wrong bracket";
const Err_WrongColon = "colon only allowed between property name and value";
// << depth >>
const Err_TooDeep = "maximum nesting depth exceeded";
// << trailing >>
const Err_NonwhitespaceAfterEnd = "unexpected non-whitespace character after end of JSON";
// << literal >>
const Err_BadLiteral = "invalid literal";
// << string >>
const Err_BadEscapeInString = "bad escape sequence in JSON string";
const Err_BadUnicodeEscapeInString = "bad Unicode escape sequence in JSON string";
const Err_BadUtf8InString = "invalid UTF-8 sequence in JSON string";
const Err_ControlCharacterForbiddenInString = "control character not allowed in JSON string";
const Err_LoneSurrogateInString = "unpaired surrogate in Unicode escape sequence";
const Err_UnterminatedString = "unterminated JSON string";
// << number >>
const Err_EmptyExponentPart = "the exponent part of a number cannot be empty";
const Err_EmptyFractionPart = "the fraction part of a number cannot be empty";
const Err_EmptyIntegerPart = "the integer part of a number cannot be empty";
const Err_LeadingZeroForbidden = "leading zero not allowed";
const Err_UnexpectedInNumber = "unexpected character in number";

export const enum JsonFeedParserStage {
  NOT_STARTED = -1,
  PARSING = 0,
  ENDED = 1,
  FAILED = 2,
}

/**
 * Non-blocking JSON parser reading bytes from a `JsonFeeder`.
 *
 * Each `nextEvent()` call consumes bytes until one event is available and returns it.
 * `need_more_input` means the feeder ran dry: feed it (or mark it done) and call again,
 * parsing resumes exactly where it stopped, even inside a token.
 * `error` and `eof` are terminal and returned by every later call.
 */
export interface JsonFeedParser {
  nextEvent(): JsonEvent;
  /** payload of the event just returned, `undefined` if it has none */
  get value(): string | undefined;

  get feeder(): JsonFeeder;
  /** number of bytes processed */
  get position(): number;
  /** number of arrays and objects currently open */
  get depth(): number;
  get maxDepth(): number;
  get error(): JsonFeedParserError | undefined;

  getStage(): JsonFeedParserStage;
}

export const createJsonFeedParser = (option?: JsonFeedParserOption): JsonFeedParser => {
  option = option || {};
  const maxDepth = option.maxDepth ?? DEFAULT_MAX_DEPTH;
  if (!Number.isInteger(maxDepth) || maxDepth < 0)
    throw new JsonParserError(`maxDepth must be a non-negative integer: ${maxDepth}`);
  const acceptTopLevelScalar = option.acceptTopLevelScalar;
  const acceptMultipleValues = option.acceptMultipleValues;
  const _feeder = option.feeder ?? createJsonFeeder(option.feederCapacity ?? DEFAULT_FEEDER_CAPACITY);

  let _position = 0;

  /**
   * The state of the location
   * - at the start/end of the root node
   * - at the start/end of an object's key or value
   * - at the start/end of an array's element
   */
  let _location = LocationState.ROOT_START;
  /**
   * The state of the value being scanned
   */
  let _state = ValueState.EMPTY;
  /**
   * primary value substate (see following)
   *
   * possible values:
   *   `NULL`/`TRUE`/`FALSE`: index of the next expected character
   *
   *   `NUMBER`: [-1] accept sign, not yet accept number
   *             [0]  already accept +0/-0
   *             [1]  already accept non-leading 0 number
   *
   *   `NUMBER_FRACTION`: [0] not yet accept digits, [1] already accept digits
   *
   *   `NUMBER_EXPONENT`: [0] not yet accept any
   *                      [1] already accept sign, not accept digits
   *                      [2] already accept digits
   *
   *   `STRING_UNICODE`: the code unit read so far
   *
   *   `STRING_UTF8`: the code point read so far
   */
  let _substate = 0;
  /**
   * `STRING_UNICODE`: number of hex digits read
   * `STRING_UTF8`: number of continuation bytes still expected
   */
  let _count = 0;
  /* accepted range of the next UTF-8 continuation byte */
  let _lower = 0x80;
  let _upper = 0xbf;
  /* high surrogate waiting for its low half */
  let _highSurrogate = 0;
  let _isDouble = false;
  let _list: string[] = [];

  const _stack = new Uint8Array(maxDepth);
  let _depth = 0;

  /* a byte that ended a number, processed on the next call */
  let _carry = -1;
  let _terminal: JsonTerminalEvent | undefined;
  let _value: string | undefined;

  function _throw(kind: JsonFeedParserErrorKind, c: number | undefined, msg: string): never {
    throw new JsonFeedParserError(kind, msg, c, _position);
  }

  const _completeValue = () => {
    _state = ValueState.EMPTY;
    _location = NEXT_STATE_TABLE[_location];
  };
  const _open = (c: number, location: LocationState) => {
    if (_depth >= maxDepth) _throw("depth", c, Err_TooDeep);
    _stack[_depth++] = _location;
    _location = location;
  };
  const _close = () => {
    _location = NEXT_STATE_TABLE[_stack[--_depth]];
  };

  const _handleComma = (c: number): undefined => {
    if (_location === LocationState.VALUE_END) {
      _location = LocationState.KEY_START;
      return;
    } else if (_location === LocationState.ELEMENT_END) {
      _location = LocationState.ELEMENT_START;
      return;
    }
    if (_location === LocationState.ELEMENT_FIRST_START || _location === LocationState.ELEMENT_START)
      _throw("structure", c, Err_MissingValue);
    if (_location === LocationState.VALUE_START) _throw("structure", c, Err_EmptyValueInObject);
    _throw("structure", c, Err_Unexpected);
  };
  const _handleArrayEnd = (c: number) => {
    if (_location === LocationState.ELEMENT_FIRST_START || _location === LocationState.ELEMENT_END) {
      _close();
      return EVENT_END_ARRAY;
    }
    if (_location === LocationState.ELEMENT_START) _throw("structure", c, Err_TrailingCommaForbidden);
    _throw("structure", c, Err_WrongBracket);
  };
  const _handleObjectEnd = (c: number) => {
    if (_location === LocationState.KEY_FIRST_START || _location === LocationState.VALUE_END) {
      _close();
      return EVENT_END_OBJECT;
    }
    if (_location === LocationState.KEY_START) _throw("structure", c, Err_TrailingCommaForbidden);
    _throw("structure", c, Err_WrongBracket);
  };
  const _checkRoot = (c: number) => {
    if (_location === LocationState.ROOT_START && !acceptTopLevelScalar)
      _throw("structure", c, Err_ExpectedRootStructure);
  };
  const _startString = (c: number): undefined => {
    _checkRoot(c);
    _state = ValueState.STRING;
    _list = [];
  };
  const _startNumber = (c: number, substate: number): undefined => {
    _checkRoot(c);
    _state = ValueState.NUMBER;
    _substate = substate;
    _isDouble = false;
    _list = [String.fromCharCode(c)];
  };
  const _startLiteral = (c: number, state: ValueState): undefined => {
    _checkRoot(c);
    _state = state;
    _substate = 1;
  };

  const _stepEmpty = (c: number): JsonEvent | undefined => {
    if (isWhitespace(c)) return;
    if (_location === LocationState.ROOT_END) {
      if (!acceptMultipleValues) _throw("trailing", c, Err_NonwhitespaceAfterEnd);
      _location = LocationState.ROOT_START;
    }

    if (_location === LocationState.KEY_FIRST_START || _location === LocationState.KEY_START) {
      if (c === 0x22) return _startString(c);
      if (c === 0x7d) return _handleObjectEnd(c);
      _throw("structure", c, Err_BadPropertyNameInObject);
    }
    if (c === 0x3a) {
      if (_location === LocationState.KEY_END) {
        _location = LocationState.VALUE_START;
        return;
      }
      _throw("structure", c, _location === LocationState.VALUE_START ? Err_RepeatedColon : Err_WrongColon);
    }
    if (_location === LocationState.KEY_END) _throw("structure", c, Err_ExpectedColon);

    if (c === 0x5d) return _handleArrayEnd(c);
    if (c === 0x7d) return _handleObjectEnd(c);
    if (c === 0x2c) return _handleComma(c);
    if (_location === LocationState.ELEMENT_END || _location === LocationState.VALUE_END)
      _throw("structure", c, Err_ExpectedComma);

    switch (c) {
      case 0x5b /* [ */:
        _open(c, LocationState.ELEMENT_FIRST_START);
        return EVENT_START_ARRAY;
      case 0x7b /* { */:
        _open(c, LocationState.KEY_FIRST_START);
        return EVENT_START_OBJECT;
      case 0x22 /* " */:
        return _startString(c);

      case 0x2d /* - */:
        return _startNumber(c, -1);
      case 0x30:
        return _startNumber(c, 0);
      case 0x31:
      case 0x32:
      case 0x33:
      case 0x34:
      case 0x35:
      case 0x36:
      case 0x37:
      case 0x38:
      case 0x39:
        return _startNumber(c, 1);

      case 0x6e /* n */:
        return _startLiteral(c, ValueState.NULL);
      case 0x74 /* t */:
        return _startLiteral(c, ValueState.TRUE);
      case 0x66 /* f */:
        return _startLiteral(c, ValueState.FALSE);
    }
    _throw("structure", c, Err_Unexpected);
  };
  const _stepLiteral = (c: number, literal: string, event: JsonStructuralEvent) => {
    if (c !== literal.charCodeAt(_substate)) _throw("lexical", c, Err_BadLiteral);
    if (++_substate === literal.length) {
      _completeValue();
      return event;
    }
  };

  const _endString = (): JsonEvent => {
    const value = _list.join("");
    _list = [];
    const isKey = _location === LocationState.KEY_FIRST_START || _location === LocationState.KEY_START;
    _completeValue();
    return isKey ? { type: "field_name", value } : { type: "value_string", value };
  };
  const _startUtf8 = (c: number): undefined => {
    if (c >= 0xc2 && c <= 0xdf) {
      _count = 1;
      _substate = c & 0x1f;
    } else if (c >= 0xe0 && c <= 0xef) {
      _count = 2;
      _substate = c & 0x0f;
      if (c === 0xe0) _lower = 0xa0; // overlong
      else if (c === 0xed) _upper = 0x9f; // surrogates
    } else if (c >= 0xf0 && c <= 0xf4) {
      _count = 3;
      _substate = c & 0x07;
      if (c === 0xf0) _lower = 0x90; // overlong
      else if (c === 0xf4) _upper = 0x8f; // above U+10FFFF
    } else _throw("lexical", c, Err_BadUtf8InString);
    _state = ValueState.STRING_UTF8;
  };
  const _endUnicodeEscape = (c: number) => {
    const unit = _substate;
    if (_highSurrogate) {
      if (unit < 0xdc00 || unit > 0xdfff) _throw("lexical", c, Err_LoneSurrogateInString);
      _list.push(String.fromCharCode(_highSurrogate, unit));
      _highSurrogate = 0;
      _state = ValueState.STRING;
    } else if (unit >= 0xd800 && unit <= 0xdbff) {
      _highSurrogate = unit;
      _state = ValueState.STRING_SURROGATE;
    } else if (unit >= 0xdc00 && unit <= 0xdfff) {
      _throw("lexical", c, Err_LoneSurrogateInString);
    } else {
      _list.push(String.fromCharCode(unit));
      _state = ValueState.STRING;
    }
  };
  const _startUnicodeEscape = (): undefined => {
    _state = ValueState.STRING_UNICODE;
    _substate = 0;
    _count = 0;
  };

  const _finishNumber = (): JsonNumberEvent => {
    const value = _list.join("");
    _list = [];
    _completeValue();
    return _isDouble ? { type: "value_double", value } : { type: "value_int", value };
  };
  const _endNumber = (c: number) => {
    if (!isNumberSeparator(c) && !(acceptMultipleValues && _location === LocationState.ROOT_START && isRootStart(c)))
      _throw("lexical", c, Err_UnexpectedInNumber);
    _carry = c;
    return _finishNumber();
  };
  const _startExponent = (c: number): undefined => {
    _state = ValueState.NUMBER_EXPONENT;
    _substate = 0;
    _isDouble = true;
    _list.push(String.fromCharCode(c));
  };

  const _step = (c: number): JsonEvent | undefined => {
    switch (_state) {
      case ValueState.EMPTY:
        return _stepEmpty(c);
      case ValueState.NULL:
        return _stepLiteral(c, "null", EVENT_NULL);
      case ValueState.TRUE:
        return _stepLiteral(c, "true", EVENT_TRUE);
      case ValueState.FALSE:
        return _stepLiteral(c, "false", EVENT_FALSE);

      case ValueState.STRING:
        if (c === 0x22) return _endString();
        if (c === 0x5c) {
          _state = ValueState.STRING_ESCAPE;
          return;
        }
        if (c < 0x20) _throw("lexical", c, Err_ControlCharacterForbiddenInString);
        if (c < 0x80) {
          _list.push(String.fromCharCode(c));
          return;
        }
        return _startUtf8(c);
      case ValueState.STRING_UTF8:
        if (c < _lower || c > _upper) _throw("lexical", c, Err_BadUtf8InString);
        _lower = 0x80;
        _upper = 0xbf;
        _substate = (_substate << 6) | (c & 0x3f);
        if (--_count === 0) {
          _list.push(String.fromCodePoint(_substate));
          _state = ValueState.STRING;
        }
        return;
      case ValueState.STRING_ESCAPE: {
        if (c === 0x75 /* u */) return _startUnicodeEscape();
        const dc = ESCAPE_TABLE[String.fromCharCode(c)];
        if (dc !== undefined) {
          _list.push(dc);
          _state = ValueState.STRING;
          return;
        }
        _throw("lexical", c, Err_BadEscapeInString);
      }
      case ValueState.STRING_UNICODE: {
        const digit = hexValue(c);
        if (digit < 0) _throw("lexical", c, Err_BadUnicodeEscapeInString);
        _substate = (_substate << 4) | digit;
        if (++_count === 4) _endUnicodeEscape(c);
        return;
      }
      case ValueState.STRING_SURROGATE:
        if (c === 0x5c) {
          _state = ValueState.STRING_SURROGATE_ESCAPE;
          return;
        }
        _throw("lexical", c, Err_LoneSurrogateInString);
      case ValueState.STRING_SURROGATE_ESCAPE:
        if (c === 0x75) return _startUnicodeEscape();
        _throw("lexical", c, Err_LoneSurrogateInString);

      case ValueState.NUMBER:
        if (isDigit(c)) {
          if (_substate === 0) _throw("lexical", c, Err_LeadingZeroForbidden);
          if (_substate === -1) _substate = c === 0x30 ? 0 : 1;
          _list.push(String.fromCharCode(c));
          return;
        }
        if (_substate === -1) _throw("lexical", c, Err_EmptyIntegerPart);
        if (c === 0x2e /* . */) {
          _state = ValueState.NUMBER_FRACTION;
          _substate = 0;
          _isDouble = true;
          _list.push(".");
          return;
        }
        if (c === 0x65 || c === 0x45) return _startExponent(c);
        return _endNumber(c);
      case ValueState.NUMBER_FRACTION:
        if (isDigit(c)) {
          _substate = 1;
          _list.push(String.fromCharCode(c));
          return;
        }
        if (!_substate) _throw("lexical", c, Err_EmptyFractionPart);
        if (c === 0x65 || c === 0x45) return _startExponent(c);
        return _endNumber(c);
      case ValueState.NUMBER_EXPONENT:
        if (c === 0x2b || c === 0x2d) {
          if (_substate === 0) {
            _substate = 1;
            _list.push(String.fromCharCode(c));
            return;
          }
          _throw("lexical", c, Err_UnexpectedInNumber);
        }
        if (isDigit(c)) {
          _substate = 2;
          _list.push(String.fromCharCode(c));
          return;
        }
        if (_substate !== 2) _throw("lexical", c, Err_EmptyExponentPart);
        return _endNumber(c);
    }
  };
  const _end = (): JsonEvent => {
    switch (_state) {
      case ValueState.EMPTY:
        if (_location === LocationState.ROOT_END) return (_terminal = EVENT_EOF);
        if (_location === LocationState.ROOT_START) _throw("structure", undefined, Err_EmptyInput);
        _throw("structure", undefined, Err_Eof);
      case ValueState.NUMBER:
        if (_substate === -1) _throw("lexical", undefined, Err_EmptyIntegerPart);
        return _finishNumber();
      case ValueState.NUMBER_FRACTION:
        if (!_substate) _throw("lexical", undefined, Err_EmptyFractionPart);
        return _finishNumber();
      case ValueState.NUMBER_EXPONENT:
        if (_substate !== 2) _throw("lexical", undefined, Err_EmptyExponentPart);
        return _finishNumber();
      case ValueState.NULL:
      case ValueState.TRUE:
      case ValueState.FALSE:
        _throw("lexical", undefined, Err_BadLiteral);
      default:
        _throw("lexical", undefined, Err_UnterminatedString);
    }
  };
  const _next = (): JsonEvent => {
    for (;;) {
      let c: number;
      if (_carry >= 0) {
        c = _carry;
        _carry = -1;
      } else if (_feeder.hasInput()) c = _feeder.nextInput();
      else if (_feeder.isDoneAndEmpty()) return _end();
      else return EVENT_NEED_MORE_INPUT;

      const event = _step(c);
      if (_carry < 0) ++_position;
      if (event !== undefined) return event;
    }
  };

  return {
    nextEvent() {
      if (_terminal !== undefined) return _terminal;
      let event: JsonEvent;
      try {
        event = _next();
      } catch (e) {
        if (!(e instanceof JsonFeedParserError)) throw e;
        event = _terminal = { type: "error", error: e };
      }
      _value = isJsonPayloadEvent(event) ? event.value : undefined;
      return event;
    },
    get value() {
      return _value;
    },

    get feeder() {
      return _feeder;
    },
    get position() {
      return _position;
    },
    get depth() {
      return _depth;
    },
    get maxDepth() {
      return maxDepth;
    },
    get error() {
      return _terminal?.type === "error" ? _terminal.error : undefined;
    },

    getStage(): JsonFeedParserStage {
      if (_terminal !== undefined)
        return _terminal.type === "eof" ? JsonFeedParserStage.ENDED : JsonFeedParserStage.FAILED;
      if (_state !== ValueState.EMPTY || _carry >= 0) return JsonFeedParserStage.PARSING;
      if (_location === LocationState.ROOT_START) return JsonFeedParserStage.NOT_STARTED;
      if (_location === LocationState.ROOT_END) return JsonFeedParserStage.ENDED;
      return JsonFeedParserStage.PARSING;
    },
  };
};

/**
 * Parse a complete input through a feeder and return all events up to the terminal one,
 * `need_more_input` excluded.
 */
export const jsonFeedParse = (input: string | Uint8Array, option?: JsonFeedParserOption): JsonEvent[] => {
  const parser = createJsonFeedParser(option);
  const feeder = parser.feeder;
  const bytes = toJsonBytes(input);
  const ret: JsonEvent[] = [];
  let i = 0;
  for (;;) {
    const event = parser.nextEvent();
    if (event.type === "need_more_input") {
      i += feeder.feedFrom(bytes, i);
      if (i === bytes.length) feeder.markDone();
      continue;
    }
    ret.push(event);
    if (isJsonTerminalEvent(event)) return ret;
  }
};
