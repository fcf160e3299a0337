/**
 * Value following `flag`, or undefined when the flag is absent
 */
export function flagValue(args: string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  if (index === -1) {
    return undefined;
  }
  const value = args[index + 1];
  return value && !value.startsWith('--') ? value : undefined;
}

/**
 * Every word after `flag` up to the next flag, so unquoted text still works
 */
export function flagWords(args: string[], flag: string): string[] {
  const index = args.indexOf(flag);
  if (index === -1) {
    return [];
  }
  const rest = args.slice(index + 1);
  const end = rest.findIndex((arg) => arg.startsWith('--'));
  return end === -1 ? rest : rest.slice(0, end);
}
