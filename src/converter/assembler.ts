/**
 * Fragment Assembler
 * Joins handler output so AsciiDoc tokens never fuse with preceding content
 */

// Runs of three or more identical delimiter characters open or close a block
const BLOCK_DELIMITER = /^(?:\|={3,}|([-=*_.+/])\1{2,})/;

export function append(accumulated: string, addition: string): string {
  if (accumulated.length > 0) {
    // Attribute lists and anchors need a word boundary
    if (addition.startsWith("[") && !/[( \n]$/.test(accumulated)) {
      return `${accumulated} ${addition}`;
    }

    if (BLOCK_DELIMITER.test(addition) && !accumulated.endsWith("\n")) {
      return `${accumulated}\n${addition}`;
    }
  }

  return accumulated + addition;
}
