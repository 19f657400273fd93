/**
 * Value types shared by the Firestore codec and the Realtime Database service.
 */

/**
 * Binary payload. Encoded as base64 on the wire.
 */
export class Bytes {
  private readonly data: Uint8Array;

  private constructor(data: Uint8Array) {
    this.data = data;
  }

  static fromUint8Array(data: Uint8Array): Bytes {
    return new Bytes(Uint8Array.from(data));
  }

  static fromBase64(base64: string): Bytes {
    return new Bytes(new Uint8Array(Buffer.from(base64, "base64")));
  }

  static fromString(text: string): Bytes {
    return new Bytes(new Uint8Array(Buffer.from(text, "utf-8")));
  }

  get length(): number {
    return this.data.length;
  }

  toUint8Array(): Uint8Array {
    return Uint8Array.from(this.data);
  }

  toBase64(): string {
    return Buffer.from(this.data).toString("base64");
  }

  toString(): string {
    return Buffer.from(this.data).toString("utf-8");
  }

  isEqual(other: Bytes): boolean {
    return Buffer.from(this.data).equals(Buffer.from(other.data));
  }
}

/**
 * Latitude/longitude pair.
 */
export class GeoPoint {
  readonly latitude: number;
  readonly longitude: number;

  constructor(latitude: number, longitude: number) {
    this.latitude = latitude;
    this.longitude = longitude;
  }

  isEqual(other: GeoPoint): boolean {
    return this.latitude === other.latitude && this.longitude === other.longitude;
  }
}

/**
 * Values the Firestore codec converts to and from wire form.
 */
export type HostValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | Date
  | Bytes
  | GeoPoint
  | HostValue[]
  | { [key: string]: HostValue };

export type DocumentData = { [key: string]: HostValue };
