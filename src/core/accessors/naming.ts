/**
 * Upper-case exactly the first character: `count` -> `Count`, `_n` -> `_n`.
 */
export function capitalize(name: string): string {
  return name.charAt(0).toUpperCase() + name.slice(1);
}

export function accessorNames(fieldName: string): { getter: string; setter: string } {
  const suffix = capitalize(fieldName);
  return { getter: `get${suffix}`, setter: `set${suffix}` };
}
