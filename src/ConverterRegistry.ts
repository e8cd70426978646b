import type { IConverter } from "./IConverter.js";
import type { SourceType } from "./types.js";

/**
 * Maps each source type to the converter that handles it. Registering a type again replaces its converter.
 */
export class ConverterRegistry {
  private readonly converters = new Map<SourceType, IConverter>();

  register(sourceType: SourceType, converter: IConverter): this {
    this.converters.set(sourceType, converter);
    return this;
  }

  get(sourceType: SourceType): IConverter | undefined {
    return this.converters.get(sourceType);
  }

  supportedTypes(): SourceType[] {
    return [...this.converters.keys()];
  }
}
