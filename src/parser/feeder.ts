import { DEFAULT_FEEDER_CAPACITY, JsonFeederError } from "./base";

/**
 * Bounded byte queue between the caller and the parser.
 *
 * The caller pushes bytes with `feed`/`feedFrom` until `isFull()` and calls `markDone()`
 * once the input is exhausted; the parser pulls them with `nextInput()`.
 */
export interface JsonFeeder {
  feed(byte: number): void;
  /** Feed bytes of `bytes[start, end)` until full, returns the number of bytes taken */
  feedFrom(bytes: ArrayLike<number>, start?: number, end?: number): number;
  isFull(): boolean;
  markDone(): void;

  hasInput(): boolean;
  isDoneAndEmpty(): boolean;
  nextInput(): number;

  get capacity(): number;
  /** number of bytes not yet consumed */
  get length(): number;
  get closed(): boolean;
}

const Err_CapacityExceeded = "feeder is full";
const Err_AlreadyClosed = "feeder has been marked as done";
const Err_InvalidByte = "not a byte";
const Err_InvalidCapacity = "capacity must be a positive integer";
const Err_Empty = "no input available";

const isByte = (b: number) => Number.isInteger(b) && b >= 0 && b <= 0xff;

export const createJsonFeeder = (capacity: number = DEFAULT_FEEDER_CAPACITY): JsonFeeder => {
  if (!Number.isInteger(capacity) || capacity <= 0)
    throw new JsonFeederError("invalid_capacity", `${Err_InvalidCapacity}: ${capacity}`);

  // ring buffer
  const _buffer = new Uint8Array(capacity);
  let _head = 0;
  let _length = 0;
  let _done = false;

  const _check = (b: number) => {
    if (!isByte(b)) throw new JsonFeederError("invalid_byte", `${Err_InvalidByte}: ${b}`);
  };
  const _push = (b: number) => {
    _buffer[(_head + _length) % capacity] = b;
    ++_length;
  };

  return {
    feed(byte: number) {
      if (_done) throw new JsonFeederError("already_closed", Err_AlreadyClosed);
      if (_length === capacity) throw new JsonFeederError("capacity_exceeded", Err_CapacityExceeded);
      _check(byte);
      _push(byte);
    },
    feedFrom(bytes: ArrayLike<number>, start = 0, end = bytes.length) {
      if (_done) throw new JsonFeederError("already_closed", Err_AlreadyClosed);
      const n = Math.max(0, Math.min(end - start, capacity - _length));
      // nothing is queued unless the whole range is valid
      for (let i = 0; i < n; ++i) _check(bytes[start + i]);
      for (let i = 0; i < n; ++i) _push(bytes[start + i]);
      return n;
    },
    isFull() {
      return _length === capacity;
    },
    markDone() {
      _done = true;
    },

    hasInput() {
      return _length !== 0;
    },
    isDoneAndEmpty() {
      return _done && _length === 0;
    },
    nextInput() {
      if (_length === 0) throw new JsonFeederError("empty", Err_Empty);
      const b = _buffer[_head];
      _head = (_head + 1) % capacity;
      --_length;
      return b;
    },

    get capacity() {
      return capacity;
    },
    get length() {
      return _length;
    },
    get closed() {
      return _done;
    },
  };
};
