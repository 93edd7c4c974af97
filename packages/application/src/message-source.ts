import type { MessageCatalog } from "@msgroute/contracts";
import {
  BoundedMap,
  DEFAULT_LANGUAGE,
  isSameLanguage,
  languageLookupChain,
} from "@msgroute/shared";

export interface MessageSource {
  /** Language untranslated messages are written in; used to format misses. */
  readonly sourceLanguage: string;
  /** Resolves to `null` when the source holds no translation. */
  translate(
    category: string,
    message: string,
    language: string,
  ): Promise<string | null>;
}

export function isMessageSource(value: unknown): value is MessageSource {
  return (
    typeof value === "object" &&
    value !== null &&
    "translate" in value &&
    typeof value.translate === "function" &&
    "sourceLanguage" in value &&
    typeof value.sourceLanguage === "string"
  );
}

export interface MissingTranslationEvent {
  category: string;
  message: string;
  language: string;
}

export type MissingTranslationHandler = (
  event: MissingTranslationEvent,
) => string | null | undefined;

export interface BaseMessageSourceOptions {
  sourceLanguage?: string;
  forceTranslation?: boolean;
  onMissingTranslation?: MissingTranslationHandler;
  /** Loaded catalogs kept per source; the oldest is dropped first. */
  maxCachedCatalogs?: number;
}

export const DEFAULT_MAX_CACHED_CATALOGS = 1000;

function lookupMessage(
  catalog: MessageCatalog,
  message: string,
): string | null {
  if (!Object.hasOwn(catalog, message)) return null;
  return catalog[message] || null;
}

/**
 * Shared lookup flow for catalog-backed sources: skips lookups in the source
 * language, loads one catalog per category and language (generic language
 * first, regional entries on top), caches it, and lets `onMissingTranslation`
 * fill gaps.
 */
export abstract class BaseMessageSource implements MessageSource {
  readonly sourceLanguage: string;
  readonly forceTranslation: boolean;

  private readonly onMissingTranslation: MissingTranslationHandler | null;
  private readonly catalogs: BoundedMap<string, Promise<MessageCatalog>>;

  constructor(options: BaseMessageSourceOptions = {}) {
    this.sourceLanguage = options.sourceLanguage ?? DEFAULT_LANGUAGE;
    this.forceTranslation = options.forceTranslation ?? false;
    this.onMissingTranslation = options.onMissingTranslation ?? null;
    this.catalogs = new BoundedMap(
      options.maxCachedCatalogs ?? DEFAULT_MAX_CACHED_CATALOGS,
    );
  }

  async translate(
    category: string,
    message: string,
    language: string,
  ): Promise<string | null> {
    if (!this.forceTranslation && isSameLanguage(language, this.sourceLanguage)) {
      return null;
    }

    const catalog = await this.loadCatalog(category, language);
    const translation = lookupMessage(catalog, message);
    if (translation !== null) return translation;

    const replacement = this.onMissingTranslation?.({
      category,
      message,
      language,
    });
    if (!replacement) return null;

    catalog[message] = replacement;
    return replacement;
  }

  protected abstract loadMessages(
    category: string,
    language: string,
  ): Promise<MessageCatalog>;

  private loadCatalog(
    category: string,
    language: string,
  ): Promise<MessageCatalog> {
    const key = JSON.stringify([language, category]);
    const cached = this.catalogs.get(key);
    if (cached) return cached;

    const pending: Promise<MessageCatalog> = this.loadMergedMessages(
      category,
      language,
    ).catch((error: unknown) => {
      if (this.catalogs.get(key) === pending) this.catalogs.delete(key);
      throw error;
    });
    this.catalogs.set(key, pending);
    return pending;
  }

  private async loadMergedMessages(
    category: string,
    language: string,
  ): Promise<MessageCatalog> {
    const merged: MessageCatalog = {};

    for (const candidate of languageLookupChain(language)) {
      const messages = await this.loadMessages(category, candidate);
      for (const [key, value] of Object.entries(messages)) {
        if (value !== "") merged[key] = value;
      }
    }

    return merged;
  }
}

export type InMemoryMessages = Record<
  string,
  Record<string, Record<string, string>>
>;

export interface InMemoryMessageSourceOptions extends BaseMessageSourceOptions {
  /** language -> category -> message -> translation */
  messages?: InMemoryMessages;
}

export class InMemoryMessageSource extends BaseMessageSource {
  private readonly messages: InMemoryMessages;

  constructor(options: InMemoryMessageSourceOptions = {}) {
    super(options);
    this.messages = options.messages ?? {};
  }

  protected async loadMessages(
    category: string,
    language: string,
  ): Promise<MessageCatalog> {
    const byCategory = Object.hasOwn(this.messages, language)
      ? this.messages[language]
      : undefined;
    if (!byCategory || !Object.hasOwn(byCategory, category)) return {};

    return { ...byCategory[category] };
  }
}
