import {
  icuFormatterConfigSchema,
  inMemoryMessageSourceConfigSchema,
  jsonFileMessageSourceConfigSchema,
} from "@msgroute/contracts";

import { JsonFileMessageSource } from "./json-file-message-source.js";
import { IcuMessageFormatter, type Formatter } from "./message-formatter.js";
import { InMemoryMessageSource, type MessageSource } from "./message-source.js";
import { ObjectFactory } from "./object-factory.js";

export function createDefaultMessageSourceFactory(): ObjectFactory<MessageSource> {
  return new ObjectFactory<MessageSource>("message source")
    .register(
      "memory",
      inMemoryMessageSourceConfigSchema,
      (config) => new InMemoryMessageSource(config),
    )
    .register(
      "json-file",
      jsonFileMessageSourceConfigSchema,
      (config) => new JsonFileMessageSource(config),
    );
}

export function createDefaultFormatterFactory(): ObjectFactory<Formatter> {
  return new ObjectFactory<Formatter>("formatter").register(
    "icu",
    icuFormatterConfigSchema,
    (config) => new IcuMessageFormatter(config),
  );
}
