import { Stream } from "effect";

/**
 * Position of a scan through a JSON array that arrives in pieces.
 * `pending` holds the text of the element read so far.
 */
export interface ArrayScan {
  readonly depth: number;
  readonly inString: boolean;
  readonly escaped: boolean;
  readonly pending: string;
}

export const initialScan: ArrayScan = { depth: 0, inString: false, escaped: false, pending: "" };

/**
 * Reads one chunk of a top-level JSON array and returns the elements it
 * completed, as JSON text. An element may span any number of chunks.
 */
export const scanChunk = (
  scan: ArrayScan,
  chunk: string
): readonly [ArrayScan, ReadonlyArray<string>] => {
  let { depth, inString, escaped, pending } = scan;
  const elements: string[] = [];
  // start of the element text inside this chunk, -1 outside the array
  let start = depth >= 1 ? 0 : -1;

  const flush = (end: number) => {
    const text = (pending + chunk.slice(start, end)).trim();
    if (text !== "") elements.push(text);
    pending = "";
  };

  for (let i = 0; i < chunk.length; i++) {
    const c = chunk[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (c === "\\") escaped = true;
      else if (c === '"') inString = false;
      continue;
    }
    switch (c) {
      case '"':
        inString = true;
        break;
      case "[":
      case "{":
        depth += 1;
        if (depth === 1) start = i + 1;
        break;
      case "]":
      case "}":
        if (depth === 1) {
          flush(i);
          start = -1;
        }
        depth -= 1;
        break;
      case ",":
        if (depth === 1) {
          flush(i);
          start = i + 1;
        }
        break;
    }
  }

  if (start >= 0) pending += chunk.slice(start);
  return [{ depth, inString, escaped, pending }, elements];
};

/**
 * Splits a streamed JSON array into the text of its elements. Only the
 * element being read is held in memory. A body that ends inside the array
 * fails with `onIncomplete`.
 */
export const splitJsonArray =
  <E2>(onIncomplete: () => E2) =>
  <E, R>(self: Stream.Stream<string, E, R>): Stream.Stream<string, E | E2, R> =>
    Stream.suspend(() => {
      let scan = initialScan;
      return self.pipe(
        Stream.mapConcat((chunk) => {
          const [next, elements] = scanChunk(scan, chunk);
          scan = next;
          return elements;
        }),
        Stream.concat(
          Stream.suspend(
            (): Stream.Stream<never, E2> =>
              scan.depth === 0 && !scan.inString ? Stream.empty : Stream.fail(onIncomplete())
          )
        )
      );
    });
