import { ConfigurationError, ExpressionError } from "../runtime/errors";
import { VariableValue, Variables } from "../types/script";

type Token =
  | { type: "number"; value: number; pos: number }
  | { type: "string"; value: string; pos: number }
  | { type: "ident"; value: string; pos: number }
  | { type: "op"; value: string; pos: number }
  | { type: "eof"; pos: number };

type BinaryOperator =
  | "+"
  | "-"
  | "*"
  | "/"
  | "%"
  | "=="
  | "!="
  | "<"
  | "<="
  | ">"
  | ">=";

export type ExpressionNode =
  | { type: "literal"; value: VariableValue }
  | { type: "name"; name: string }
  | { type: "member"; object: ExpressionNode; property: string }
  | { type: "index"; object: ExpressionNode; index: ExpressionNode }
  | { type: "negate"; operand: ExpressionNode }
  | { type: "not"; operand: ExpressionNode }
  | { type: "and"; left: ExpressionNode; right: ExpressionNode }
  | { type: "or"; left: ExpressionNode; right: ExpressionNode }
  | { type: "binary"; operator: BinaryOperator; left: ExpressionNode; right: ExpressionNode };

const OPERATORS = [
  "||",
  "&&",
  "==",
  "!=",
  "<=",
  ">=",
  "<",
  ">",
  "!",
  "+",
  "-",
  "*",
  "/",
  "%",
  "(",
  ")",
  "[",
  "]",
  ".",
];

const ESCAPES: Record<string, string> = {
  n: "\n",
  t: "\t",
  r: "\r",
  "\\": "\\",
  "'": "'",
  '"': '"',
};

const COMPARISONS: ReadonlySet<string> = new Set(["==", "!=", "<", "<=", ">", ">="]);

function isBinaryOperator(value: string): value is BinaryOperator {
  return COMPARISONS.has(value) || ["+", "-", "*", "/", "%"].includes(value);
}

function syntaxError(source: string, pos: number, message: string): ConfigurationError {
  return new ConfigurationError(`Invalid expression "${source}"`, [`at ${pos}: ${message}`]);
}

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < source.length) {
    const char = source[pos];

    if (/\s/.test(char)) {
      pos += 1;
      continue;
    }

    if (/[0-9]/.test(char)) {
      const match = /^[0-9]+(\.[0-9]+)?/.exec(source.slice(pos));
      const text = match ? match[0] : char;
      tokens.push({ type: "number", value: Number(text), pos });
      pos += text.length;
      continue;
    }

    if (/[A-Za-z_]/.test(char)) {
      const match = /^[A-Za-z_][A-Za-z0-9_]*/.exec(source.slice(pos));
      const text = match ? match[0] : char;
      tokens.push({ type: "ident", value: text, pos });
      pos += text.length;
      continue;
    }

    if (char === '"' || char === "'") {
      const start = pos;
      let value = "";
      pos += 1;
      while (pos < source.length && source[pos] !== char) {
        if (source[pos] === "\\" && pos + 1 < source.length) {
          const escaped = source[pos + 1];
          value += ESCAPES[escaped] ?? escaped;
          pos += 2;
        } else {
          value += source[pos];
          pos += 1;
        }
      }
      if (pos >= source.length) {
        throw syntaxError(source, start, "unterminated string");
      }
      pos += 1;
      tokens.push({ type: "string", value, pos: start });
      continue;
    }

    const operator = OPERATORS.find((candidate) => source.startsWith(candidate, pos));
    if (!operator) {
      throw syntaxError(source, pos, `unexpected character '${char}'`);
    }
    tokens.push({ type: "op", value: operator, pos });
    pos += operator.length;
  }

  tokens.push({ type: "eof", pos: source.length });
  return tokens;
}

class Parser {
  private index = 0;

  constructor(
    private readonly source: string,
    private readonly tokens: Token[],
  ) {}

  parse(): ExpressionNode {
    const node = this.parseOr();
    const token = this.peek();
    if (token.type !== "eof") {
      throw syntaxError(this.source, token.pos, "unexpected trailing input");
    }
    return node;
  }

  private peek(): Token {
    return this.tokens[Math.min(this.index, this.tokens.length - 1)];
  }

  private advance(): Token {
    const token = this.peek();
    this.index += 1;
    return token;
  }

  private matchOp(...values: string[]): string | null {
    const token = this.peek();
    if (token.type === "op" && values.includes(token.value)) {
      this.index += 1;
      return token.value;
    }
    return null;
  }

  private matchWord(word: string): boolean {
    const token = this.peek();
    if (token.type === "ident" && token.value === word) {
      this.index += 1;
      return true;
    }
    return false;
  }

  private expectOp(value: string): void {
    const token = this.peek();
    if (!this.matchOp(value)) {
      throw syntaxError(this.source, token.pos, `expected '${value}'`);
    }
  }

  private parseOr(): ExpressionNode {
    let left = this.parseAnd();
    while (this.matchOp("||") || this.matchWord("or")) {
      left = { type: "or", left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): ExpressionNode {
    let left = this.parseNot();
    while (this.matchOp("&&") || this.matchWord("and")) {
      left = { type: "and", left, right: this.parseNot() };
    }
    return left;
  }

  private parseNot(): ExpressionNode {
    if (this.matchOp("!") || this.matchWord("not")) {
      return { type: "not", operand: this.parseNot() };
    }
    return this.parseCompare();
  }

  private parseCompare(): ExpressionNode {
    const left = this.parseSum();
    const operator = this.matchOp("==", "!=", "<", "<=", ">", ">=");
    if (operator && isBinaryOperator(operator)) {
      return { type: "binary", operator, left, right: this.parseSum() };
    }
    return left;
  }

  private parseSum(): ExpressionNode {
    let left = this.parseProduct();
    let operator = this.matchOp("+", "-");
    while (operator && isBinaryOperator(operator)) {
      left = { type: "binary", operator, left, right: this.parseProduct() };
      operator = this.matchOp("+", "-");
    }
    return left;
  }

  private parseProduct(): ExpressionNode {
    let left = this.parseUnary();
    let operator = this.matchOp("*", "/", "%");
    while (operator && isBinaryOperator(operator)) {
      left = { type: "binary", operator, left, right: this.parseUnary() };
      operator = this.matchOp("*", "/", "%");
    }
    return left;
  }

  private parseUnary(): ExpressionNode {
    if (this.matchOp("-")) {
      return { type: "negate", operand: this.parseUnary() };
    }
    return this.parsePostfix();
  }

  private parsePostfix(): ExpressionNode {
    let node = this.parsePrimary();
    for (;;) {
      if (this.matchOp(".")) {
        const token = this.advance();
        if (token.type !== "ident") {
          throw syntaxError(this.source, token.pos, "expected a property name after '.'");
        }
        node = { type: "member", object: node, property: token.value };
      } else if (this.matchOp("[")) {
        const index = this.parseOr();
        this.expectOp("]");
        node = { type: "index", object: node, index };
      } else {
        return node;
      }
    }
  }

  private parsePrimary(): ExpressionNode {
    const token = this.advance();
    switch (token.type) {
      case "number":
      case "string":
        return { type: "literal", value: token.value };
      case "ident":
        if (token.value === "true") return { type: "literal", value: true };
        if (token.value === "false") return { type: "literal", value: false };
        if (token.value === "null") return { type: "literal", value: null };
        if (["and", "or", "not"].includes(token.value)) {
          throw syntaxError(this.source, token.pos, `unexpected keyword '${token.value}'`);
        }
        return { type: "name", name: token.value };
      case "op":
        if (token.value === "(") {
          const inner = this.parseOr();
          this.expectOp(")");
          return inner;
        }
        throw syntaxError(this.source, token.pos, `unexpected '${token.value}'`);
      case "eof":
        throw syntaxError(this.source, token.pos, "unexpected end of expression");
    }
  }
}

export function truthy(value: VariableValue): boolean {
  return !(value === false || value === null || value === 0 || value === "");
}

function describe(value: VariableValue): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "list";
  return typeof value;
}

function isRecord(value: VariableValue): value is { [key: string]: VariableValue } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function ownValue(record: { [key: string]: VariableValue }, key: string): VariableValue {
  return Object.prototype.hasOwnProperty.call(record, key) ? record[key] : null;
}

function stringify(value: VariableValue): string {
  if (typeof value === "string") return value;
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

function equals(left: VariableValue, right: VariableValue): boolean {
  if (typeof left !== "object" || typeof right !== "object" || left === null || right === null) {
    return left === right;
  }
  return JSON.stringify(left) === JSON.stringify(right);
}

function requireNumber(value: VariableValue, operator: string): number {
  if (typeof value !== "number") {
    throw new ExpressionError(`Operator '${operator}' needs numbers, got ${describe(value)}`);
  }
  return value;
}

function evaluateNode(node: ExpressionNode, variables: Variables): VariableValue {
  switch (node.type) {
    case "literal":
      return node.value;
    case "name":
      if (node.name === "variables") {
        return { ...variables };
      }
      return ownValue(variables, node.name);
    case "member":
      return readProperty(evaluateNode(node.object, variables), node.property);
    case "index":
      return readProperty(
        evaluateNode(node.object, variables),
        evaluateNode(node.index, variables),
      );
    case "negate":
      return -requireNumber(evaluateNode(node.operand, variables), "-");
    case "not":
      return !truthy(evaluateNode(node.operand, variables));
    case "and":
      return truthy(evaluateNode(node.left, variables)) && truthy(evaluateNode(node.right, variables));
    case "or":
      return truthy(evaluateNode(node.left, variables)) || truthy(evaluateNode(node.right, variables));
    case "binary":
      return applyBinary(
        node.operator,
        evaluateNode(node.left, variables),
        evaluateNode(node.right, variables),
      );
  }
}

function readProperty(target: VariableValue, key: VariableValue): VariableValue {
  if (target === null) {
    return null;
  }
  if (Array.isArray(target) || typeof target === "string") {
    if (key === "length") {
      return target.length;
    }
    if (typeof key === "number" && Number.isInteger(key)) {
      const item = target[key];
      return item === undefined ? null : item;
    }
    throw new ExpressionError(`Cannot index a ${describe(target)} with ${stringify(key)}`);
  }
  if (isRecord(target)) {
    if (typeof key !== "string") {
      throw new ExpressionError(`Object keys must be strings, got ${describe(key)}`);
    }
    return ownValue(target, key);
  }
  throw new ExpressionError(`Cannot read '${stringify(key)}' of a ${describe(target)}`);
}

function applyBinary(
  operator: BinaryOperator,
  left: VariableValue,
  right: VariableValue,
): VariableValue {
  switch (operator) {
    case "==":
      return equals(left, right);
    case "!=":
      return !equals(left, right);
    case "<":
    case "<=":
    case ">":
    case ">=":
      return compare(operator, left, right);
    case "+":
      if (typeof left === "string" || typeof right === "string") {
        return stringify(left) + stringify(right);
      }
      return requireNumber(left, operator) + requireNumber(right, operator);
    case "-":
      return requireNumber(left, operator) - requireNumber(right, operator);
    case "*":
      return requireNumber(left, operator) * requireNumber(right, operator);
    case "/":
    case "%": {
      const dividend = requireNumber(left, operator);
      const divisor = requireNumber(right, operator);
      if (divisor === 0) {
        throw new ExpressionError(
          operator === "/" ? "Division by zero" : "Modulo by zero",
        );
      }
      return operator === "/" ? dividend / divisor : dividend % divisor;
    }
  }
}

function compare(operator: string, left: VariableValue, right: VariableValue): boolean {
  if (typeof left === "number" && typeof right === "number") {
    return ordered(operator, left - right);
  }
  if (typeof left === "string" && typeof right === "string") {
    return ordered(operator, left < right ? -1 : left > right ? 1 : 0);
  }
  throw new ExpressionError(`Cannot compare ${describe(left)} ${operator} ${describe(right)}`);
}

function ordered(operator: string, difference: number): boolean {
  switch (operator) {
    case "<":
      return difference < 0;
    case "<=":
      return difference <= 0;
    case ">":
      return difference > 0;
    default:
      return difference >= 0;
  }
}

export interface CompiledExpression {
  readonly source: string;
  readonly ast: ExpressionNode;
  evaluate(variables: Variables): VariableValue;
}

/** Parses once; syntax errors surface as ConfigurationError. */
export function compileExpression(source: string): CompiledExpression {
  if (source.trim().length === 0) {
    throw syntaxError(source, 0, "expression is empty");
  }
  const ast = new Parser(source, tokenize(source)).parse();
  return {
    source,
    ast,
    evaluate: (variables) => evaluateNode(ast, variables),
  };
}
