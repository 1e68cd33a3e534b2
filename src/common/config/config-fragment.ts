import { validateSync } from 'class-validator';

/**
 * # Base class for module configs
 *
 * Properties are declared with `@UseEnv` and class-validator decorators;
 * the whole fragment is validated once, on construction.
 */
export abstract class ConfigFragment {
  constructor() {
    this.validateSelf();
  }

  private validateSelf(): void {
    const errors = validateSync(this);
    if (errors.length > 0) {
      const fields = errors.map((e) => e.property).join(', ');
      throw new Error(`Invalid ${this.constructor.name} on fields ${fields}`);
    }
  }
}
