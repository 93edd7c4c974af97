export type DateTimeArgumentKind = "date" | "time";

export interface MessageOption {
  selector: string;
  nodes: MessageNode[];
}

export type MessageNode =
  | { type: "text"; value: string }
  | { type: "pound" }
  | { type: "argument"; name: string }
  | { type: "number"; name: string; style: string | null }
  | {
      type: "datetime";
      kind: DateTimeArgumentKind;
      name: string;
      style: string | null;
    }
  | {
      type: "plural";
      name: string;
      ordinal: boolean;
      offset: number;
      options: MessageOption[];
    }
  | { type: "select"; name: string; options: MessageOption[] };

export class MessageSyntaxError extends Error {
  readonly offset: number;

  constructor(message: string, offset: number) {
    super(`${message} at offset ${offset}`);
    this.name = "MessageSyntaxError";
    this.offset = offset;
  }
}

const IDENTIFIER_CHAR = /[\p{L}\p{N}_]/u;
const WHITESPACE = /\s/u;

class MessagePatternParser {
  private index = 0;

  constructor(private readonly source: string) {}

  parse(): MessageNode[] {
    const nodes = this.parseNodes(false);
    if (this.index < this.source.length) {
      throw new MessageSyntaxError("Unexpected closing brace", this.index);
    }
    return nodes;
  }

  private parseNodes(inPlural: boolean): MessageNode[] {
    const nodes: MessageNode[] = [];
    let text = "";

    const flushText = (): void => {
      if (text) {
        nodes.push({ type: "text", value: text });
        text = "";
      }
    };

    while (this.index < this.source.length) {
      const char = this.peek();

      if (char === "}") break;

      if (char === "{") {
        flushText();
        nodes.push(this.parseArgument(inPlural));
      } else if (char === "#" && inPlural) {
        flushText();
        nodes.push({ type: "pound" });
        this.index += 1;
      } else if (char === "'") {
        text += this.readApostrophe(inPlural);
      } else {
        text += char;
        this.index += 1;
      }
    }

    flushText();
    return nodes;
  }

  // '' is a literal apostrophe; ' before a syntax character opens a quoted
  // run up to the next lone '; any other ' is literal.
  private readApostrophe(inPlural: boolean): string {
    const next = this.peek(1);

    if (next === "'") {
      this.index += 2;
      return "'";
    }

    if (next !== "{" && next !== "}" && !(inPlural && next === "#")) {
      this.index += 1;
      return "'";
    }

    this.index += 1;
    let quoted = "";
    while (this.index < this.source.length) {
      const char = this.peek();
      if (char === "'") {
        if (this.peek(1) === "'") {
          quoted += "'";
          this.index += 2;
          continue;
        }
        this.index += 1;
        return quoted;
      }
      quoted += char;
      this.index += 1;
    }

    return quoted;
  }

  private parseArgument(inPlural: boolean): MessageNode {
    const start = this.index;
    this.expect("{");
    this.skipWhitespace();

    const name = this.readIdentifier();
    if (!name) {
      throw new MessageSyntaxError("Expected argument name", this.index);
    }

    this.skipWhitespace();
    if (this.consume("}")) {
      return { type: "argument", name };
    }

    this.expect(",");
    this.skipWhitespace();
    const argumentType = this.readIdentifier();
    this.skipWhitespace();

    switch (argumentType) {
      case "number":
        return { type: "number", name, style: this.parseStyle() };
      case "date":
      case "time":
        return {
          type: "datetime",
          kind: argumentType === "date" ? "date" : "time",
          name,
          style: this.parseStyle(),
        };
      case "plural":
      case "selectordinal": {
        this.expect(",");
        this.skipWhitespace();
        const offset = this.parseOffset();
        return {
          type: "plural",
          name,
          ordinal: argumentType === "selectordinal",
          offset,
          options: this.parseOptions(true, start),
        };
      }
      case "select":
        this.expect(",");
        return {
          type: "select",
          name,
          options: this.parseOptions(inPlural, start),
        };
      default:
        throw new MessageSyntaxError(
          `Unsupported argument type "${argumentType}"`,
          start,
        );
    }
  }

  private parseStyle(): string | null {
    if (!this.consume(",")) {
      this.expect("}");
      return null;
    }

    const styleStart = this.index;
    while (this.index < this.source.length && this.peek() !== "}") {
      if (this.peek() === "{") {
        throw new MessageSyntaxError("Unexpected brace in style", this.index);
      }
      this.index += 1;
    }
    const style = this.source.slice(styleStart, this.index).trim();
    this.expect("}");

    return style || null;
  }

  private parseOffset(): number {
    if (!this.source.startsWith("offset:", this.index)) return 0;

    this.index += "offset:".length;
    this.skipWhitespace();
    const digitsStart = this.index;
    while (/\d/.test(this.peek())) {
      this.index += 1;
    }
    if (digitsStart === this.index) {
      throw new MessageSyntaxError("Expected plural offset", this.index);
    }

    return Number(this.source.slice(digitsStart, this.index));
  }

  private parseOptions(inPlural: boolean, argumentStart: number): MessageOption[] {
    const options: MessageOption[] = [];

    for (;;) {
      this.skipWhitespace();
      if (this.index >= this.source.length) {
        throw new MessageSyntaxError("Unexpected end of message", this.index);
      }
      if (this.consume("}")) break;

      const selectorStart = this.index;
      while (
        this.index < this.source.length &&
        !WHITESPACE.test(this.peek()) &&
        this.peek() !== "{" &&
        this.peek() !== "}"
      ) {
        this.index += 1;
      }
      const selector = this.source.slice(selectorStart, this.index);
      if (!selector) {
        throw new MessageSyntaxError("Expected option selector", this.index);
      }

      this.skipWhitespace();
      this.expect("{");
      const nodes = this.parseNodes(inPlural);
      this.expect("}");
      options.push({ selector, nodes });
    }

    if (!options.some((option) => option.selector === "other")) {
      throw new MessageSyntaxError('Missing "other" option', argumentStart);
    }

    return options;
  }

  private readIdentifier(): string {
    const start = this.index;
    while (
      this.index < this.source.length &&
      IDENTIFIER_CHAR.test(this.peek())
    ) {
      this.index += 1;
    }
    return this.source.slice(start, this.index);
  }

  private skipWhitespace(): void {
    while (
      this.index < this.source.length &&
      WHITESPACE.test(this.peek())
    ) {
      this.index += 1;
    }
  }

  private peek(ahead = 0): string {
    return this.source.charAt(this.index + ahead);
  }

  private consume(char: string): boolean {
    if (this.peek() !== char) return false;
    this.index += 1;
    return true;
  }

  private expect(char: string): void {
    if (this.index >= this.source.length) {
      throw new MessageSyntaxError("Unexpected end of message", this.index);
    }
    if (!this.consume(char)) {
      throw new MessageSyntaxError(
        `Expected "${char}" but found "${this.peek()}"`,
        this.index,
      );
    }
  }
}

export function parseMessagePattern(pattern: string): MessageNode[] {
  return new MessagePatternParser(pattern).parse();
}
