type Token =
  | { type: "number"; value: number }
  | { type: "op"; value: "+" | "-" | "*" | "/" }
  | { type: "paren"; value: "(" | ")" };

type OpSymbol = Extract<Token, { type: "op" }>["value"];

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    if (ch === " ") {
      i += 1;
      continue;
    }
    if (ch >= "0" && ch <= "9") {
      let end = i;
      while (end < text.length && text[end] >= "0" && text[end] <= "9") {
        end += 1;
      }
      tokens.push({ type: "number", value: Number(text.slice(i, end)) });
      i = end;
      continue;
    }
    if (ch === "+" || ch === "-" || ch === "*" || ch === "/") {
      tokens.push({ type: "op", value: ch });
      i += 1;
      continue;
    }
    if (ch === "(" || ch === ")") {
      tokens.push({ type: "paren", value: ch });
      i += 1;
      continue;
    }
    throw new Error(`Unexpected character '${ch}' at ${i}`);
  }
  return tokens;
}

class Parser {
  private pos = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): number {
    const value = this.expression();
    if (this.pos < this.tokens.length) {
      throw new Error(`Unexpected token at position ${this.pos}`);
    }
    return value;
  }

  private peekOp(): OpSymbol | undefined {
    const token = this.tokens[this.pos];
    return token && token.type === "op" ? token.value : undefined;
  }

  private expression(): number {
    let value = this.term();
    for (let op = this.peekOp(); op === "+" || op === "-"; op = this.peekOp()) {
      this.pos += 1;
      const right = this.term();
      value = op === "+" ? value + right : value - right;
    }
    return value;
  }

  private term(): number {
    let value = this.factor();
    for (let op = this.peekOp(); op === "*" || op === "/"; op = this.peekOp()) {
      this.pos += 1;
      const right = this.factor();
      if (op === "*") {
        value *= right;
        continue;
      }
      if (right === 0) {
        throw new Error("Division by zero");
      }
      const quotient = Math.trunc(value / right);
      value = quotient === 0 ? 0 : quotient;
    }
    return value;
  }

  private factor(): number {
    const token = this.tokens[this.pos];
    if (!token) {
      throw new Error("Unexpected end of expression");
    }
    this.pos += 1;
    if (token.type === "number") {
      return token.value;
    }
    if (token.type === "op" && token.value === "-") {
      const negated = this.factor();
      return negated === 0 ? 0 : -negated;
    }
    if (token.type === "paren" && token.value === "(") {
      const value = this.expression();
      const close = this.tokens[this.pos];
      if (!close || close.type !== "paren" || close.value !== ")") {
        throw new Error("Missing closing parenthesis");
      }
      this.pos += 1;
      return value;
    }
    throw new Error(`Unexpected token '${token.value}'`);
  }
}

/**
 * Evaluates an integer expression under conventional precedence, with
 * truncating division. Used to double-check rendered search expressions.
 */
export function evaluateStandard(text: string): number {
  return new Parser(tokenize(text)).parse();
}
