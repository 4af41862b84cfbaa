/** Codec between wire text and decoded JSON values. */
export interface Serializer {
  encode(value: unknown): string;
  decode(text: string): unknown;
}

export interface JsonSerializerOptions {
  /** Escape every non-ASCII character as \uXXXX so the output is 7-bit clean. */
  forceAscii?: boolean;
}

export function escapeNonAscii(json: string): string {
  return json.replace(/[\u0080-\uffff]/g, (char) => `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`);
}

export class JsonSerializer implements Serializer {
  private readonly forceAscii: boolean;

  constructor(options: JsonSerializerOptions = {}) {
    this.forceAscii = options.forceAscii ?? false;
  }

  public encode(value: unknown): string {
    const json = JSON.stringify(value);
    if (json === undefined) {
      throw new TypeError('Value cannot be encoded as JSON');
    }
    return this.forceAscii ? escapeNonAscii(json) : json;
  }

  public decode(text: string): unknown {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  }
}
