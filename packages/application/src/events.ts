import type { I18nEvent } from "@msgroute/contracts";

export interface I18nEventPublisher {
  publish(event: I18nEvent): void;
}

export const noopI18nEventPublisher: I18nEventPublisher = {
  publish() {
    return;
  },
};

export function createConsoleI18nEventPublisher(): I18nEventPublisher {
  return {
    publish(event: I18nEvent): void {
      if (event.type === "message_format_failed") {
        console.warn(JSON.stringify(event));
        return;
      }
      console.log(JSON.stringify(event));
    },
  };
}
