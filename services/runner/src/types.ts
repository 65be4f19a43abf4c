export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** Positional slots are addressed by index, named slots by key. */
export type SlotAddress = number | string;

export type PayloadMeta = Record<string, JsonValue>;

/**
 * Unit of data exchanged with a runner. `container` names the scheme used to
 * interpret `data` and is treated as an opaque tag by the wire codec.
 */
export interface Payload {
  readonly data: Buffer;
  readonly meta: PayloadMeta;
  readonly container: string;
}
