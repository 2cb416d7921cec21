export function buildIntentUserPrompt(
  text: string,
  meta: { timezone: string; nowLocal: string; weekday: string },
): string {
  return [
    `Current time: ${meta.weekday}, ${meta.nowLocal}`,
    `Time zone: ${meta.timezone}`,
    '',
    'User message:',
    text,
  ].join('\n');
}
