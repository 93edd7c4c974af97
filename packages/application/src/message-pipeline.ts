import type { MessageParams, ObjectDescriptor } from "@msgroute/contracts";
import {
  hasIcuSyntax,
  normalizeMessageParams,
  substitutePlaceholders,
} from "@msgroute/domain";
import { isSameLanguage, SystemClock, type Clock } from "@msgroute/shared";

import {
  CategoryResolver,
  type CategoryBinding,
  type CategoryBindings,
} from "./category-resolver.js";
import {
  createConsoleI18nEventPublisher,
  type I18nEventPublisher,
} from "./events.js";
import {
  createDefaultFormatterFactory,
  createDefaultMessageSourceFactory,
} from "./factories.js";
import {
  IcuMessageFormatter,
  isFormatter,
  type Formatter,
} from "./message-formatter.js";
import type { MessageSource } from "./message-source.js";
import type { ObjectFactory } from "./object-factory.js";

export interface MessagePipelineOptions {
  /** Category pattern -> source or descriptor, in registration order. */
  translations: CategoryBindings;
  sourceFactory?: ObjectFactory<MessageSource>;
  formatter?: Formatter | ObjectDescriptor;
  formatterFactory?: ObjectFactory<Formatter>;
  eventPublisher?: I18nEventPublisher;
  clock?: Clock;
}

export class MessagePipeline {
  private readonly resolver: CategoryResolver;
  private readonly formatterFactory: ObjectFactory<Formatter>;
  private readonly eventPublisher: I18nEventPublisher;
  private readonly clock: Clock;
  private formatter: Formatter | ObjectDescriptor | null;

  constructor(options: MessagePipelineOptions) {
    this.resolver = new CategoryResolver(
      options.translations,
      options.sourceFactory ?? createDefaultMessageSourceFactory(),
    );
    this.formatterFactory =
      options.formatterFactory ?? createDefaultFormatterFactory();
    this.eventPublisher =
      options.eventPublisher ?? createConsoleI18nEventPublisher();
    this.clock = options.clock ?? new SystemClock();
    this.formatter = options.formatter ?? null;
  }

  /**
   * Looks `message` up in the source bound to `category` and formats it.
   * A miss formats the untranslated text in the source's own language.
   */
  async translate(
    category: string,
    message: string,
    params: MessageParams | null | undefined,
    language: string,
  ): Promise<string> {
    const source = this.resolver.resolve(category);
    const translation = await source.translate(category, message, language);

    if (translation === null) {
      if (!isSameLanguage(language, source.sourceLanguage)) {
        this.eventPublisher.publish({
          type: "translation_missing",
          category,
          message,
          language,
          sourceLanguage: source.sourceLanguage,
          occurredAt: this.clock.nowIso(),
        });
      }
      return this.format(message, params, source.sourceLanguage);
    }

    return this.format(translation, params, language);
  }

  format(
    message: string,
    params: MessageParams | null | undefined,
    language: string,
  ): string {
    const normalized = normalizeMessageParams(params);
    if (Object.keys(normalized).length === 0) {
      return message;
    }

    if (!hasIcuSyntax(message)) {
      return substitutePlaceholders(message, normalized);
    }

    const result = this.getFormatter().format(message, normalized, language);
    if (result.ok) {
      return result.value;
    }

    this.eventPublisher.publish({
      type: "message_format_failed",
      message,
      language,
      reason: result.error,
      occurredAt: this.clock.nowIso(),
    });
    return message;
  }

  resolveSource(category: string): MessageSource {
    return this.resolver.resolve(category);
  }

  bindSource(pattern: string, binding: CategoryBinding): void {
    this.resolver.bind(pattern, binding);
  }

  getFormatter(): Formatter {
    const current = this.formatter;
    if (current !== null && isFormatter(current)) {
      return current;
    }

    const formatter =
      current === null
        ? new IcuMessageFormatter()
        : this.formatterFactory.create(current);
    this.formatter = formatter;
    return formatter;
  }

  setFormatter(formatter: Formatter | ObjectDescriptor): void {
    this.formatter = formatter;
  }
}
