import { ConditionEvaluationError } from "./errors.js";
import type { Variables } from "./types.js";
import { lookupVariable } from "./variables.js";

type ComparisonOperator = "==" | "!=" | "<" | "<=" | ">" | ">=";

type Token =
  | { type: "literal"; value: string | number | boolean | null }
  | { type: "ref"; path: string }
  | { type: "op"; value: ComparisonOperator }
  | { type: "keyword"; value: "and" | "or" | "not" }
  | { type: "lparen" }
  | { type: "rparen" };

export type ConditionAst =
  | { type: "literal"; value: string | number | boolean | null }
  | { type: "ref"; path: string }
  | { type: "not"; operand: ConditionAst }
  | { type: "logical"; operator: "and" | "or"; left: ConditionAst; right: ConditionAst }
  | { type: "compare"; operator: ComparisonOperator; left: ConditionAst; right: ConditionAst };

const operators: ComparisonOperator[] = ["==", "!=", "<=", ">=", "<", ">"];

function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  let index = 0;

  while (index < expression.length) {
    const char = expression[index];

    if (/\s/.test(char)) {
      index += 1;
      continue;
    }
    if (char === "(") {
      tokens.push({ type: "lparen" });
      index += 1;
      continue;
    }
    if (char === ")") {
      tokens.push({ type: "rparen" });
      index += 1;
      continue;
    }
    if (char === "$" && expression[index + 1] === "{") {
      const end = expression.indexOf("}", index + 2);
      if (end === -1) {
        throw new ConditionEvaluationError("Unterminated variable reference", expression);
      }
      tokens.push({ type: "ref", path: expression.slice(index + 2, end) });
      index = end + 1;
      continue;
    }
    if (char === '"' || char === "'") {
      let value = "";
      let cursor = index + 1;
      let closed = false;
      while (cursor < expression.length) {
        const current = expression[cursor];
        if (current === "\\" && cursor + 1 < expression.length) {
          value += expression[cursor + 1];
          cursor += 2;
          continue;
        }
        if (current === char) {
          closed = true;
          break;
        }
        value += current;
        cursor += 1;
      }
      if (!closed) {
        throw new ConditionEvaluationError("Unterminated string literal", expression);
      }
      tokens.push({ type: "literal", value });
      index = cursor + 1;
      continue;
    }
    const number = /^-?\d+(\.\d+)?/.exec(expression.slice(index));
    if (number) {
      tokens.push({ type: "literal", value: Number(number[0]) });
      index += number[0].length;
      continue;
    }
    const operator = operators.find((candidate) => expression.startsWith(candidate, index));
    if (operator) {
      tokens.push({ type: "op", value: operator });
      index += operator.length;
      continue;
    }
    const word = /^[A-Za-z_]\w*/.exec(expression.slice(index));
    if (word) {
      const text = word[0];
      if (text === "and" || text === "or" || text === "not") {
        tokens.push({ type: "keyword", value: text });
      } else if (text === "true" || text === "false") {
        tokens.push({ type: "literal", value: text === "true" });
      } else if (text === "null") {
        tokens.push({ type: "literal", value: null });
      } else {
        throw new ConditionEvaluationError(`Unexpected identifier '${text}'`, expression);
      }
      index += text.length;
      continue;
    }
    throw new ConditionEvaluationError(`Unexpected character '${char}'`, expression);
  }

  return tokens;
}

class Parser {
  private position = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly expression: string
  ) {}

  parse(): ConditionAst {
    if (this.tokens.length === 0) {
      throw new ConditionEvaluationError("Empty expression", this.expression);
    }
    const node = this.parseOr();
    if (this.position < this.tokens.length) {
      throw new ConditionEvaluationError("Unexpected trailing input", this.expression);
    }
    return node;
  }

  private peek(): Token | undefined {
    return this.tokens[this.position];
  }

  private isKeyword(value: "and" | "or" | "not"): boolean {
    const token = this.peek();
    return token?.type === "keyword" && token.value === value;
  }

  private parseOr(): ConditionAst {
    let left = this.parseAnd();
    while (this.isKeyword("or")) {
      this.position += 1;
      left = { type: "logical", operator: "or", left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): ConditionAst {
    let left = this.parseNot();
    while (this.isKeyword("and")) {
      this.position += 1;
      left = { type: "logical", operator: "and", left, right: this.parseNot() };
    }
    return left;
  }

  private parseNot(): ConditionAst {
    if (this.isKeyword("not")) {
      this.position += 1;
      return { type: "not", operand: this.parseNot() };
    }
    return this.parseComparison();
  }

  private parseComparison(): ConditionAst {
    const left = this.parseOperand();
    const token = this.peek();
    if (token?.type !== "op") {
      return left;
    }
    this.position += 1;
    return { type: "compare", operator: token.value, left, right: this.parseOperand() };
  }

  private parseOperand(): ConditionAst {
    const token = this.peek();
    if (!token) {
      throw new ConditionEvaluationError("Unexpected end of expression", this.expression);
    }
    this.position += 1;
    switch (token.type) {
      case "literal":
        return { type: "literal", value: token.value };
      case "ref":
        return { type: "ref", path: token.path };
      case "lparen": {
        const inner = this.parseOr();
        if (this.peek()?.type !== "rparen") {
          throw new ConditionEvaluationError("Missing closing parenthesis", this.expression);
        }
        this.position += 1;
        return inner;
      }
      default:
        throw new ConditionEvaluationError("Expected a value", this.expression);
    }
  }
}

export function parseCondition(expression: string): ConditionAst {
  return new Parser(tokenize(expression), expression).parse();
}

function typeName(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function compare(operator: ComparisonOperator, left: unknown, right: unknown, expression: string): boolean {
  if (operator === "==" || operator === "!=") {
    if (left !== null && right !== null) {
      const scalar = typeof left === "string" || typeof left === "number" || typeof left === "boolean";
      if (!scalar || typeof left !== typeof right) {
        throw new ConditionEvaluationError(`Cannot compare ${typeName(left)} with ${typeName(right)}`, expression);
      }
    }
    return operator === "==" ? left === right : left !== right;
  }

  let order: number;
  if (typeof left === "number" && typeof right === "number") {
    order = left - right;
  } else if (typeof left === "string" && typeof right === "string") {
    order = left < right ? -1 : left > right ? 1 : 0;
  } else {
    throw new ConditionEvaluationError(
      `Operator '${operator}' needs two numbers or two strings, got ${typeName(left)} and ${typeName(right)}`,
      expression
    );
  }
  switch (operator) {
    case "<":
      return order < 0;
    case "<=":
      return order <= 0;
    case ">":
      return order > 0;
    case ">=":
      return order >= 0;
  }
}

function expectBoolean(value: unknown, context: string, expression: string): boolean {
  if (typeof value !== "boolean") {
    throw new ConditionEvaluationError(`${context} must be a boolean, got ${typeName(value)}`, expression);
  }
  return value;
}

function evaluateNode(node: ConditionAst, scope: Variables, expression: string): unknown {
  switch (node.type) {
    case "literal":
      return node.value;
    case "ref":
      return lookupVariable(node.path, scope);
    case "not":
      return !expectBoolean(evaluateNode(node.operand, scope, expression), "Operand of 'not'", expression);
    case "logical": {
      const left = expectBoolean(evaluateNode(node.left, scope, expression), `Operand of '${node.operator}'`, expression);
      if (node.operator === "and" && !left) return false;
      if (node.operator === "or" && left) return true;
      return expectBoolean(evaluateNode(node.right, scope, expression), `Operand of '${node.operator}'`, expression);
    }
    case "compare":
      return compare(
        node.operator,
        evaluateNode(node.left, scope, expression),
        evaluateNode(node.right, scope, expression),
        expression
      );
  }
}

export function evaluateCondition(expression: string, scope: Variables): boolean {
  const tree = parseCondition(expression);
  return expectBoolean(evaluateNode(tree, scope, expression), "Condition result", expression);
}
