export type DataCompatOptions = {
  /** Imports added to the generated unit, as `module#ExportName` (or a bare module for a side-effect import). */
  importsForDefaults?: string[];
  /** Attach an empty `Companion` holder to the generated class. */
  generateCompanionObject?: boolean;
};

/**
 * Marks a non-exported `...Data` class for synthesis.
 * Inert at run time; the datacompat build step reads it from source.
 */
export function DataCompat(_options: DataCompatOptions = {}): ClassDecorator {
  return () => undefined;
}

/**
 * Default expression for a constructor parameter, written as source text.
 * `@Default('"anon"')` defaults to the string `anon`, `@Default("42")` to the number 42.
 */
export function Default(_expression: string): ParameterDecorator {
  return () => undefined;
}
