import { afterEach, describe, expect, it } from "vitest";

import { getInstance, releaseInstance, t } from "./default-instance.js";
import { InternalError } from "./errors.js";
import { noopI18nEventPublisher } from "./events.js";
import { MessagePipeline } from "./message-pipeline.js";

afterEach(() => {
  releaseInstance();
});

describe("default pipeline instance", () => {
  it("rejects translations before initialization", async () => {
    await expect(t("app", "Hello")).rejects.toBeInstanceOf(InternalError);
  });

  it("binds a single descriptor to every category", async () => {
    const pipeline = getInstance({
      class: "memory",
      messages: { "en-US": {}, fr: { app: { "Hello, {name}": "Bonjour, {name}" } } },
    });

    expect(getInstance()).toBe(pipeline);
    await expect(t("app", "Hello, {name}", { name: "Ada" }, "fr")).resolves.toBe(
      "Bonjour, Ada",
    );
    await expect(t("app", "Hello, {name}", { name: "Ada" })).resolves.toBe(
      "Hello, Ada",
    );
  });

  it("accepts full pipeline options", () => {
    const pipeline = getInstance({
      translations: { "*": { class: "memory" } },
      eventPublisher: noopI18nEventPublisher,
    });

    expect(pipeline).toBeInstanceOf(MessagePipeline);
  });

  it("creates a fresh instance after release", () => {
    const first = getInstance({ class: "memory" });
    releaseInstance();
    const second = getInstance({ class: "memory" });

    expect(second).not.toBe(first);
  });
});
