const BINARY_RATIO = 0.3;

// tab, newline, form feed, carriage return, escape
const ALLOWED_CONTROL_BYTES = new Set([0x09, 0x0a, 0x0c, 0x0d, 0x1b]);

function isTextByte(byte: number): boolean {
  return byte >= 0x20 || ALLOWED_CONTROL_BYTES.has(byte);
}

/**
 * Classifies the leading bytes of a file. Any NUL byte means binary; otherwise
 * the sample is binary when more than 30% of it falls outside the text bytes.
 */
export function sniffBinary(sample: Uint8Array): boolean {
  if (sample.includes(0)) return true;

  let nonText = 0;
  for (const byte of sample) {
    if (!isTextByte(byte)) nonText++;
  }
  return nonText > sample.length * BINARY_RATIO;
}
