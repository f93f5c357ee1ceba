import { parseBoolean, parseDouble, parseFloat32, parseInteger, parseLong } from './ConfigurationValues';

/**
 * Describes one effective change of a variable.
 * `value` is undefined when the variable was removed.
 */
export class ConfigurationEvent {
  constructor(
    public readonly name: string,
    public readonly value: string | undefined
  ) {}

  isRemoval(): boolean {
    return this.value === undefined;
  }

  getIntegerValue(): number {
    return parseInteger(this.value);
  }

  getLongValue(): bigint {
    return parseLong(this.value);
  }

  getFloatValue(): number {
    return parseFloat32(this.value);
  }

  getDoubleValue(): number {
    return parseDouble(this.value);
  }

  getBooleanValue(): boolean {
    return parseBoolean(this.value);
  }
}
