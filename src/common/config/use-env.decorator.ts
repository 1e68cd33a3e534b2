import { reasonOf } from '@common/errors/single-line-message';

/**
 * # Binds a config property to an environment variable
 *
 * The value is read (and transformed) on first access and kept per instance.
 *
 * ```typescript
 * class Config extends ConfigFragment {
 *   @UseEnv('PORT', (raw) => (raw ? parseInt(raw, 10) : 3000))
 *   public readonly port!: number;
 * }
 * ```
 */
export const UseEnv =
  <TProperty>(
    name: string,
    transform?: (raw?: string) => TProperty,
  ): PropertyDecorator =>
  (proto, propertyKey) => {
    const computed = new WeakMap<object, { value: unknown }>();

    Object.defineProperty(proto, propertyKey, {
      enumerable: true,
      configurable: true,
      get(this: object): unknown {
        let cached = computed.get(this);

        if (!cached) {
          const raw = process.env[name];
          try {
            cached = { value: transform ? transform(raw) : raw };
          } catch (err) {
            throw new Error(
              `Failed to transform config ${name}: ${reasonOf(err)}`,
            );
          }
          computed.set(this, cached);
        }

        return cached.value;
      },
    });
  };
