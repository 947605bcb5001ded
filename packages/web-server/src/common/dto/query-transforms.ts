import { Transform } from 'class-transformer';

/**
 * Query-string boolean: "true"/"1" and "false"/"0". Reads the raw value,
 * since implicit conversion turns any non-empty string into true.
 */
export function ToBoolean(): PropertyDecorator {
  return Transform(({ obj, key }: { obj: Record<string, unknown>; key: string }) => {
    const raw = obj[key];
    if (raw === undefined || raw === '') {
      return undefined;
    }
    if (raw === true || raw === 'true' || raw === '1') {
      return true;
    }
    if (raw === false || raw === 'false' || raw === '0') {
      return false;
    }
    return raw;
  });
}

/**
 * Repeated (`?a=1&a=2`) or comma separated (`?a=1,2`) query values
 */
export function ToStringArray(): PropertyDecorator {
  return Transform(({ obj, key }: { obj: Record<string, unknown>; key: string }) => {
    const raw = obj[key];
    if (raw === undefined) {
      return undefined;
    }
    const values = Array.isArray(raw) ? raw : [raw];
    return values
      .flatMap((value) => String(value).split(','))
      .map((value) => value.trim())
      .filter((value) => value !== '');
  });
}
