import { assertExists } from "../../utils/assert";
import { FIRST_LINE } from "./theBasics";

const reTerminator = /\r\n|\n|\r/g;

/**
 * Lazily splits `text` into its lines, yielding each line's content
 * without its terminator, paired with its line number.
 * 
 * A text without terminators is a single line, and so is an empty text.
 */
export const iterLines = function*(text: string): Iterable<[string, number]> {
  let lineNumber = FIRST_LINE;
  let lastEnd = 0;
  for (const match of text.matchAll(reTerminator)) {
    const index = assertExists("Expected an index.", match.index);
    yield [text.slice(lastEnd, index), lineNumber];
    lineNumber += 1;
    lastEnd = index + match[0].length;
  }
  yield [text.slice(lastEnd), lineNumber];
};
