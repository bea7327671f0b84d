/** Fills {{NAME}} placeholders. Unknown placeholders are left as they are. */
export const fillPrompt = (template: string, vars: Record<string, string>): string =>
  template.replace(/\{\{([A-Z_]+)\}\}/g, (match, key: string) => (key in vars ? vars[key] : match));

export const truncateText = (text: string, maxChars: number): string =>
  text.length <= maxChars ? text : `${text.slice(0, maxChars)}\n[truncated]`;

export const bulletList = (items: readonly string[], empty = 'None'): string =>
  items.length ? items.map((item) => `- ${item}`).join('\n') : empty;
