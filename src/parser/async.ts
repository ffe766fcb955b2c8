import { JsonFeedParserOption, toJsonBytes } from "./base";
import { isJsonTerminalEvent, JsonEvent } from "./event";
import { createJsonFeedParser } from "./stream";

/**
 * Drive a `JsonFeedParser` from a chunked source (a Node `Readable`, an array of chunks, ...).
 *
 * Yields every event except `need_more_input` and stops after `eof` or `error`.
 */
export async function* jsonFeedEvents(
  source: AsyncIterable<Uint8Array | string> | Iterable<Uint8Array | string>,
  option?: JsonFeedParserOption,
): AsyncGenerator<JsonEvent, void, undefined> {
  const parser = createJsonFeedParser(option);
  const feeder = parser.feeder;

  for await (const chunk of source) {
    const bytes = toJsonBytes(chunk);
    let i = 0;
    while (i < bytes.length) {
      i += feeder.feedFrom(bytes, i);
      for (;;) {
        const event = parser.nextEvent();
        if (event.type === "need_more_input") break;
        yield event;
        if (isJsonTerminalEvent(event)) return;
      }
    }
  }

  feeder.markDone();
  for (;;) {
    const event = parser.nextEvent();
    yield event;
    if (isJsonTerminalEvent(event)) return;
  }
}
