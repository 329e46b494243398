const encoder = new TextEncoder();
const decoder = new TextDecoder();
const strictDecoder = new TextDecoder("utf-8", { fatal: true });

export function fromString(text: string): Uint8Array {
  return encoder.encode(text);
}

export function decodeToString(data: Uint8Array): string {
  return decoder.decode(data);
}

/** Decode UTF-8, or null when the bytes are not valid UTF-8. */
export function decodeUtf8Strict(data: Uint8Array): string | null {
  try {
    return strictDecoder.decode(data);
  } catch {
    return null;
  }
}

/** Header bytes are decoded one byte per char so offsets stay aligned. */
export function decodeLatin1(data: Uint8Array): string {
  let out = "";
  for (let i = 0; i < data.length; i++) {
    out += String.fromCharCode(data[i]);
  }
  return out;
}

export function concat(chunks: Uint8Array[]): Uint8Array {
  let total = 0;
  for (const chunk of chunks) total += chunk.length;

  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}

export function indexOfByte(
  buffer: Uint8Array,
  byte: number,
  fromIndex = 0,
): number {
  for (let i = fromIndex; i < buffer.length; i++) {
    if (buffer[i] === byte) return i;
  }
  return -1;
}
