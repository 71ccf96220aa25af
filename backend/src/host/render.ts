/**
 * Card template rendering: `{{Field}}`, `{{filter:Field}}`, `{{FrontSide}}`
 * and `{{#Field}}...{{/Field}}` / `{{^Field}}...{{/Field}}` sections.
 */

export type FieldMap = Record<string, string>;

const SECTION = /\{\{([#^])([^}]+)\}\}([\s\S]*?)\{\{\/\2\}\}/g;
const TAG = /\{\{([^}]+)\}\}/g;

function isFilled(value: string | undefined): boolean {
  return value !== undefined && value.trim().length > 0;
}

function stripHtml(value: string): string {
  return value.replace(/<[^>]*>/g, "");
}

/**
 * Renders one template side. Unknown fields render empty.
 */
export function renderTemplate(format: string, fields: FieldMap, frontSide = ""): string {
  let previous: string;
  let text = format;
  // Sections may nest; expand until stable
  do {
    previous = text;
    text = text.replace(SECTION, (_match, kind: string, name: string, body: string) => {
      const filled = isFilled(fields[name.trim()]);
      return (kind === "#") === filled ? body : "";
    });
  } while (text !== previous);

  return text.replace(TAG, (_match, tag: string) => {
    const parts = tag.split(":").map((part) => part.trim());
    const name = parts.pop() ?? "";
    if (name === "FrontSide") {
      return frontSide;
    }
    const value = fields[name] ?? "";
    return parts.includes("text") ? stripHtml(value) : value;
  });
}

export interface RenderedCard {
  question: string;
  answer: string;
}

export function renderCard(qfmt: string, afmt: string, fields: FieldMap): RenderedCard {
  const question = renderTemplate(qfmt, fields);
  const answer = renderTemplate(afmt, fields, question);
  return { question, answer };
}

/** True when the question side renders to visible text, ignoring markup. */
export function hasQuestion(qfmt: string, fields: FieldMap): boolean {
  return stripHtml(renderTemplate(qfmt, fields)).trim().length > 0;
}
