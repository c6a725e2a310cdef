export type ParentheticalExtraction = {
  text: string;
  hints: string[];
  keepTokens: string[];
};

const bracketPattern = /\(([^()]*)\)|\[([^[\]]*)\]|\{([^{}]*)\}/g;
const shortTokenPattern = /^[a-z0-9]{1,3}$/i;
// h3, p2x7, 5-ht1a / 5ht2c
const indexTokenPattern = /^(?:[a-z]\d+(?:[a-z]\d+)?|5-?ht\d+[a-z]?)$/i;

function isKeepToken(compactToken: string): boolean {
  return (
    shortTokenPattern.test(compactToken) || indexTokenPattern.test(compactToken)
  );
}

/**
 * Pulls bracketed segments out of the text. Every captured segment lands in
 * `hints`; short receptor indices such as "(H3)" are also returned in
 * `keepTokens` so the caller can put them back into the working text.
 */
export function extractParenthetical(text: string): ParentheticalExtraction {
  const hints: string[] = [];
  const keepTokens: string[] = [];

  const stripped = text.replace(
    bracketPattern,
    (_match: string, round?: string, square?: string, curly?: string) => {
      for (const group of [round, square, curly]) {
        if (!group) continue;
        const token = group.trim();
        if (!token) continue;
        hints.push(token);
        if (isKeepToken(token.replace(/[\s_-]/g, ""))) {
          keepTokens.push(token);
        }
      }
      return " ";
    },
  );

  return { text: stripped, hints, keepTokens };
}

export function glueHyphens(text: string): string {
  return text.replace(/\s*-\s*/g, "-");
}
