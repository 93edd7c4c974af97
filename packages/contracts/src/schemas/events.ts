export interface TranslationMissingEvent {
  type: "translation_missing";
  category: string;
  message: string;
  language: string;
  sourceLanguage: string;
  occurredAt: string;
}

export interface MessageFormatFailedEvent {
  type: "message_format_failed";
  message: string;
  language: string;
  reason: string;
  occurredAt: string;
}

export type I18nEvent = TranslationMissingEvent | MessageFormatFailedEvent;
