/**
 * Logical expressions over mutation codes
 *
 *   expr   := term ('OR' term)*
 *   term   := factor ('AND' factor)*
 *   factor := 'NOT' factor | '(' expr ')' | CODE
 *   CODE   := Y178A | Y178A/F186R
 */

const OPERAND = /^[A-Z]\d+[A-Z](?:\/[A-Z]\d+[A-Z])*$/;
const EXPRESSION_TOKEN = /\(|\)|[^\s()]+/g;

/**
 * Rewrite symbolic operators as words and collapse whitespace.
 *
 * "Y178A&(F186R|!W46X)" → "Y178A AND (F186R OR NOT W46X)"
 */
export function normalizeLogicalExpression(raw: string): string {
  return raw
    .replace(/&&?/g, ' AND ')
    .replace(/\|\|?/g, ' OR ')
    .replace(/!(?!=)/g, ' NOT ')
    .replace(/\b(and|or|not)\b/gi, (word) => ` ${word.toUpperCase()} `)
    .replace(/\s+/g, ' ')
    .replace(/\(\s+/g, '(')
    .replace(/\s+\)/g, ')')
    .trim();
}

function tokenize(expression: string): string[] {
  return expression.match(EXPRESSION_TOKEN) ?? [];
}

/**
 * AND/OR/NOT operators plus opening parentheses
 */
export function countLogicalOperators(expression: string): number {
  return tokenize(expression).filter(
    (token) => token === 'AND' || token === 'OR' || token === 'NOT' || token === '('
  ).length;
}

export function hasLogicalOperator(expression: string): boolean {
  return tokenize(expression).some((token) => token === 'AND' || token === 'OR' || token === 'NOT');
}

/**
 * Recursive-descent check against the expression grammar
 */
export function isWellFormedExpression(expression: string): boolean {
  const tokens = tokenize(expression);
  if (tokens.length === 0) {
    return false;
  }

  let pos = 0;
  const peek = () => tokens[pos];

  const parseFactor = (): boolean => {
    const token = peek();
    if (token === 'NOT') {
      pos++;
      return parseFactor();
    }
    if (token === '(') {
      pos++;
      if (!parseExpr()) return false;
      if (peek() !== ')') return false;
      pos++;
      return true;
    }
    if (token !== undefined && OPERAND.test(token)) {
      pos++;
      return true;
    }
    return false;
  };

  const parseTerm = (): boolean => {
    if (!parseFactor()) return false;
    while (peek() === 'AND') {
      pos++;
      if (!parseFactor()) return false;
    }
    return true;
  };

  const parseExpr = (): boolean => {
    if (!parseTerm()) return false;
    while (peek() === 'OR') {
      pos++;
      if (!parseTerm()) return false;
    }
    return true;
  };

  return parseExpr() && pos === tokens.length;
}
