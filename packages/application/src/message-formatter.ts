import {
  parseMessagePattern,
  stringifyParam,
  type MessageNode,
  type MessageOption,
} from "@msgroute/domain";
import {
  BoundedMap,
  describeError,
  formatLocalizedDateTime,
  isDateTimeStyle,
  normalizeLanguage,
  toDateTime,
} from "@msgroute/shared";

export type FormatResult =
  | { ok: true; value: string }
  | { ok: false; error: string };

export interface Formatter {
  format(
    template: string,
    params: Readonly<Record<string, unknown>>,
    language: string,
  ): FormatResult;
}

export function isFormatter(value: unknown): value is Formatter {
  return (
    typeof value === "object" &&
    value !== null &&
    "format" in value &&
    typeof value.format === "function"
  );
}

export interface IcuMessageFormatterOptions {
  /** Zone date and time arguments are rendered in. */
  timeZone?: string;
  /** Parsed templates kept for reuse; the oldest is dropped first. */
  maxCachedPatterns?: number;
}

export const DEFAULT_MAX_CACHED_PATTERNS = 500;

class MessageFormatError extends Error {}

interface RenderContext {
  params: Readonly<Record<string, unknown>>;
  locale: string;
  pluralValue: number | null;
}

function pickOption(
  options: ReadonlyArray<MessageOption>,
  selectors: ReadonlyArray<string>,
): MessageOption {
  for (const selector of [...selectors, "other"]) {
    const option = options.find((candidate) => candidate.selector === selector);
    if (option) return option;
  }
  throw new MessageFormatError('Missing "other" option');
}

/**
 * ICU-style formatter covering simple, number, date, time, plural,
 * selectordinal and select arguments. Failures come back as
 * `{ ok: false }` instead of throwing.
 */
export class IcuMessageFormatter implements Formatter {
  private readonly timeZone: string;
  private readonly patterns: BoundedMap<string, MessageNode[]>;

  constructor(options: IcuMessageFormatterOptions = {}) {
    this.timeZone = options.timeZone ?? "utc";
    this.patterns = new BoundedMap(
      options.maxCachedPatterns ?? DEFAULT_MAX_CACHED_PATTERNS,
    );
  }

  get cachedPatternCount(): number {
    return this.patterns.size;
  }

  format(
    template: string,
    params: Readonly<Record<string, unknown>>,
    language: string,
  ): FormatResult {
    try {
      const nodes = this.parse(template);
      const value = this.render(nodes, {
        params,
        locale: normalizeLanguage(language),
        pluralValue: null,
      });
      return { ok: true, value };
    } catch (error) {
      return { ok: false, error: describeError(error) };
    }
  }

  private parse(template: string): MessageNode[] {
    const cached = this.patterns.get(template);
    if (cached) return cached;

    const nodes = parseMessagePattern(template);
    this.patterns.set(template, nodes);
    return nodes;
  }

  private render(
    nodes: ReadonlyArray<MessageNode>,
    context: RenderContext,
  ): string {
    return nodes.map((node) => this.renderNode(node, context)).join("");
  }

  private renderNode(node: MessageNode, context: RenderContext): string {
    switch (node.type) {
      case "text":
        return node.value;
      case "pound":
        return context.pluralValue === null
          ? "#"
          : this.formatNumber(context.pluralValue, context.locale, null);
      case "argument":
        return Object.hasOwn(context.params, node.name)
          ? stringifyParam(context.params[node.name])
          : `{${node.name}}`;
      case "number":
        return this.formatNumber(
          this.requireNumber(context.params, node.name),
          context.locale,
          node.style,
        );
      case "datetime": {
        const value = toDateTime(
          this.requireParam(context.params, node.name),
          this.timeZone,
        );
        if (!value) {
          throw new MessageFormatError(
            `Argument "${node.name}" is not a valid date`,
          );
        }
        const style = node.style ?? "medium";
        if (!isDateTimeStyle(style)) {
          throw new MessageFormatError(`Unsupported ${node.kind} style "${style}"`);
        }
        return formatLocalizedDateTime(value, {
          locale: context.locale,
          kind: node.kind,
          style,
        });
      }
      case "plural": {
        const value = this.requireNumber(context.params, node.name);
        const adjusted = value - node.offset;
        const category = new Intl.PluralRules(context.locale, {
          type: node.ordinal ? "ordinal" : "cardinal",
        }).select(adjusted);
        const option = pickOption(node.options, [`=${value}`, category]);
        return this.render(option.nodes, { ...context, pluralValue: adjusted });
      }
      case "select": {
        const selector = stringifyParam(
          this.requireParam(context.params, node.name),
        );
        return this.render(pickOption(node.options, [selector]).nodes, context);
      }
    }
  }

  private formatNumber(
    value: number,
    locale: string,
    style: string | null,
  ): string {
    switch (style) {
      case null:
        return new Intl.NumberFormat(locale).format(value);
      case "integer":
        return new Intl.NumberFormat(locale, {
          maximumFractionDigits: 0,
        }).format(value);
      case "percent":
        return new Intl.NumberFormat(locale, { style: "percent" }).format(value);
      default:
        throw new MessageFormatError(`Unsupported number style "${style}"`);
    }
  }

  private requireParam(
    params: Readonly<Record<string, unknown>>,
    name: string,
  ): unknown {
    if (!Object.hasOwn(params, name)) {
      throw new MessageFormatError(`Missing argument "${name}"`);
    }
    return params[name];
  }

  private requireNumber(
    params: Readonly<Record<string, unknown>>,
    name: string,
  ): number {
    const value = this.requireParam(params, name);
    const numeric =
      typeof value === "number"
        ? value
        : typeof value === "string" && value.trim() !== ""
          ? Number(value)
          : Number.NaN;

    if (!Number.isFinite(numeric)) {
      throw new MessageFormatError(`Argument "${name}" must be a number`);
    }
    return numeric;
  }
}
