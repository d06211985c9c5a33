/**
 * Small URL helper used to build partition and request URLs.
 * - `routeParam` replaces `{name}` placeholders in the path (value is URI-encoded);
 *   placeholders already percent-encoded by a previous `getUrl()` are matched too
 * - `queryString` appends `name=value` pairs
 */
export class UrlBuilder {
  private readonly routeParams = new Map<string, string>();
  private readonly query: Array<[string, string]> = [];

  constructor(private readonly base: string) {}

  routeParam(name: string, value: string): this {
    this.routeParams.set(name, value);
    return this;
  }

  queryString(name: string, value: string): this {
    this.query.push([name, value]);
    return this;
  }

  getUrl(): string {
    let raw = this.base;
    for (const [name, value] of this.routeParams) {
      const encoded = encodeURIComponent(value);
      raw = raw.split(`{${name}}`).join(encoded).split(`%7B${name}%7D`).join(encoded);
    }

    // Throws TypeError for relative or malformed input.
    const url = new URL(raw);
    for (const [name, value] of this.query) {
      url.searchParams.append(name, value);
    }
    return url.toString();
  }
}
