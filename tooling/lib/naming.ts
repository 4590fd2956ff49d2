/**
 * Naming and documentation helpers shared by synthesis and rendering
 */

export const MARKER_SUFFIX = "Data";

/**
 * `PersonData` -> `Person`
 */
export function stripMarkerSuffix(simpleName: string): string {
  return simpleName.endsWith(MARKER_SUFFIX) ? simpleName.slice(0, simpleName.length - MARKER_SUFFIX.length) : simpleName;
}

export function capitalize(text: string): string {
  return text.length === 0 ? text : text.charAt(0).toUpperCase() + text.slice(1);
}

export function decapitalize(text: string): string {
  return text.length === 0 ? text : text.charAt(0).toLowerCase() + text.slice(1);
}

/**
 * `firstName` -> `setFirstName`
 */
export function setterName(propertyName: string): string {
  return `set${capitalize(propertyName)}`;
}

/**
 * Name of the DSL factory function for an output type: `Person` -> `person`.
 * Falls back to `create<Name>` when the type name already starts lower-case.
 */
export function factoryName(outputName: string): string {
  const lowered = decapitalize(outputName);
  return lowered === outputName ? `create${capitalize(outputName)}` : lowered;
}

/**
 * `base`, suffixed with underscores until it differs from every taken name
 */
export function freeName(base: string, taken: ReadonlySet<string>): string {
  let name = base;
  while (taken.has(name)) {
    name = `${name}_`;
  }
  return name;
}

/**
 * Label used when a property has no doc comment: `firstName` -> `First name.`
 */
export function humanizeLabel(propertyName: string): string {
  const spaced = propertyName.replace(/[A-Z]/g, (letter) => " " + letter.toLowerCase());
  return capitalize(spaced) + ".";
}

/**
 * Strip the JSDoc delimiters and leading asterisks from a raw comment
 */
export function stripCommentDelimiters(comment: string): string {
  return comment
    .replace(/^\/\*\*/, "")
    .replace(/\*\/$/, "")
    .split("\n")
    .map((line) => line.replace(/^\s*\* ?/, ""))
    .join("\n")
    .trim();
}

/**
 * Drop empty lines and a single leading space from each remaining line
 */
export function normalizeDocumentation(text: string): string {
  return text
    .split("\n")
    .filter((line) => line.trim().length > 0)
    .map((line) => (line.startsWith(" ") ? line.substring(1) : line))
    .join("\n");
}

/**
 * `Setter for` phrasing of a property doc: `The age.` -> `the age`
 */
export function setterPhrase(documentation: string): string {
  return decapitalize(documentation.trim().replace(/\.+$/, ""));
}
