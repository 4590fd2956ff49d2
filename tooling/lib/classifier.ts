import { lookupDefault } from "./default-collector";
import { InvariantViolationError } from "./errors";
import { stripMarkerSuffix } from "./naming";
import { ClassifiedProperty, ClassifiedType, DefaultValueIndex, TypeDescriptor } from "./types";

/**
 * Label each property mandatory (no default, non-nullable) or builder-defaulted.
 */
export function classifyProperties(descriptor: TypeDescriptor, index: DefaultValueIndex): ClassifiedType {
  const seen = new Set<string>();
  const properties: ClassifiedProperty[] = [];

  for (const property of descriptor.properties) {
    if (seen.has(property.name)) {
      throw new InvariantViolationError(
        descriptor.key,
        `Duplicate property "${property.name}" in ${descriptor.simpleName}`
      );
    }
    seen.add(property.name);

    const defaultExpression = lookupDefault(index, descriptor.key, property.name);
    properties.push({
      ...property,
      isMandatory: defaultExpression === undefined && !property.type.nullable,
      defaultExpression,
    });
  }

  return {
    descriptor,
    outputName: stripMarkerSuffix(descriptor.simpleName),
    properties,
  };
}

export function mandatoryProperties(classified: ClassifiedType): ClassifiedProperty[] {
  return classified.properties.filter((property) => property.isMandatory);
}

export function optionalProperties(classified: ClassifiedType): ClassifiedProperty[] {
  return classified.properties.filter((property) => !property.isMandatory);
}
