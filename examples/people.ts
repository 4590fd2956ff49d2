import { DataCompat, Default } from "../src";

export interface Named {
  readonly name: string;
}

export enum Unit {
  Metric = "metric",
  Imperial = "imperial",
}

/**
 * A person in the address book.
 */
@DataCompat({ generateCompanionObject: true })
class PersonData implements Named {
  constructor(
    /** Full name of the person. */
    readonly name: string,
    @Default('"anonymous"') readonly nickname: string,
    readonly age: number,
    readonly email?: string,
  ) {}
}

@DataCompat({ importsForDefaults: ["./people#Unit"] })
class MeasurementData {
  constructor(
    readonly value: number,
    @Default("Unit.Metric") readonly unit: Unit,
    readonly tolerance: number | null,
  ) {}
}
