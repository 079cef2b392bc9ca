import { DeepLRequestError } from './deepl-errors.js';

const TEXT_PARAM = 'text';

/**
 * Form fields of one outbound request.
 *
 * Named parameters are last-write-wins. Source texts are kept apart in an
 * append-only list so no option can drop or reorder them.
 */
export class ParameterBag {
  private readonly values = new Map<string, string>();
  private readonly texts: string[] = [];

  set(name: string, value: string): void {
    this.assertNamed(name);
    this.values.set(name, value);
  }

  delete(name: string): void {
    this.assertNamed(name);
    this.values.delete(name);
  }

  get(name: string): string | undefined {
    return this.values.get(name);
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  appendText(text: string): void {
    this.texts.push(text);
  }

  get textList(): readonly string[] {
    return this.texts;
  }

  toURLSearchParams(): URLSearchParams {
    const params = new URLSearchParams();
    for (const [name, value] of this.values) {
      params.append(name, value);
    }
    for (const text of this.texts) {
      params.append(TEXT_PARAM, text);
    }
    return params;
  }

  toString(): string {
    return this.toURLSearchParams().toString();
  }

  private assertNamed(name: string): void {
    if (name === TEXT_PARAM) {
      throw new DeepLRequestError(`"${TEXT_PARAM}" is append-only; use appendText`);
    }
  }
}
