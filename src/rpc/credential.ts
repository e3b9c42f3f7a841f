// This module stores one API credential and renders it in the formats a service may expect.

// RFC 9110 token characters, so a credential name is always a valid header field name.
const HEADER_NAME_PATTERN = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;

export class Credential {
  public readonly name: string;
  public readonly value: string;

  public constructor(name: string, value: string) {
    if (!HEADER_NAME_PATTERN.test(name)) {
      throw new TypeError(`Credential name "${name}" is not a valid HTTP header name.`);
    }
    if (/[\r\n]/.test(value)) {
      throw new TypeError(`Credential value for "${name}" must not contain line breaks.`);
    }

    this.name = name;
    this.value = value;
    Object.freeze(this);
  }

  public asHeader(): string {
    return `${this.name}: ${this.value}`;
  }

  public asQueryString(): string {
    return `${this.name}=${this.value}`;
  }

  public asCookie(): string {
    return `Cookie: ${this.name}=${this.value}`;
  }
}
