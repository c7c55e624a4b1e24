const YES_ANSWERS = new Set(['s', 'sim', 'y', 'yes']);

/** Portuguese or English yes, in any case and with surrounding spaces. */
export function isAffirmative(answer: string): boolean {
  return YES_ANSWERS.has(answer.trim().toLowerCase());
}

/** `--no-clear` wins over `--clear`; neither means ask. */
export function parseClearFlag(argv: string[]): boolean | undefined {
  if (argv.includes('--no-clear')) return false;
  if (argv.includes('--clear')) return true;
  return undefined;
}
