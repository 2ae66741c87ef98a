/**
 * True when the string has at least one cased character and none of them are uppercase.
 * "foo", "foo2" and "a_b" pass; "Foo", "123" and "" do not.
 */
export function isLowercase(value: string): boolean {
  const hasCased = value.toLowerCase() !== value.toUpperCase();
  return hasCased && value === value.toLowerCase();
}
