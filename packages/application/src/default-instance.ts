import type { MessageParams, ObjectDescriptor } from "@msgroute/contracts";
import { CATCH_ALL_PATTERN } from "@msgroute/domain";
import { DEFAULT_LANGUAGE } from "@msgroute/shared";

import { InternalError } from "./errors.js";
import {
  MessagePipeline,
  type MessagePipelineOptions,
} from "./message-pipeline.js";

let defaultPipeline: MessagePipeline | null = null;

function isPipelineOptions(
  config: MessagePipelineOptions | ObjectDescriptor,
): config is MessagePipelineOptions {
  return (
    typeof config === "object" && "translations" in config && !("class" in config)
  );
}

/**
 * Process-wide pipeline for callers without an injected instance. The first
 * call creates it; a single descriptor is bound to `*`.
 */
export function getInstance(
  config?: MessagePipelineOptions | ObjectDescriptor,
): MessagePipeline {
  if (defaultPipeline !== null) return defaultPipeline;

  if (config === undefined) {
    throw new InternalError("Message pipeline has not been initialized");
  }

  defaultPipeline = new MessagePipeline(
    isPipelineOptions(config)
      ? config
      : { translations: { [CATCH_ALL_PATTERN]: config } },
  );
  return defaultPipeline;
}

export function releaseInstance(): void {
  defaultPipeline = null;
}

export async function t(
  category: string,
  message: string,
  params: MessageParams = {},
  language?: string,
): Promise<string> {
  return getInstance().translate(
    category,
    message,
    params,
    language || DEFAULT_LANGUAGE,
  );
}
