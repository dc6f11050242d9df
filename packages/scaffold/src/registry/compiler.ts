/**
 * Field registry compiler
 *
 * Binds every rule of a registry to one instrumented type:
 * 1. resolves each latent matcher against the type,
 * 2. instantiates each distinct attribute appender factory once,
 * 3. keeps each transformer for use at resolve time.
 *
 * The factory cache lives for one call only; appenders are never shared
 * between compiles, even for the same type. Whatever a matcher, factory or
 * transformer throws reaches the caller as is.
 */

import {
  resolveLatentMatcher,
  type TypeDescription,
} from "@classforge/description";
import type { FieldAttributeAppender } from "../attribute/appender.js";
import {
  makeFieldAttributeAppender,
  stableAttributeAppenderFactoryKey,
} from "../attribute/factory.js";
import { silentLogger, type Logger } from "../logging.js";
import type {
  CompiledFieldRegistry,
  CompiledFieldRule,
} from "./compiled-registry.js";
import { fieldRules, type FieldRegistry } from "./field-registry.js";

export type CompileOptions = {
  /** Receives a summary line per compile at debug level; silent if absent */
  readonly logger?: Logger;
  /** Log every field binding decision of the compiled registry */
  readonly traceResolution?: boolean;
};

export const compileFieldRegistry = (
  registry: FieldRegistry,
  instrumentedType: TypeDescription,
  options: CompileOptions = {}
): CompiledFieldRegistry => {
  const logger = options.logger ?? silentLogger;
  const appenders = new Map<string, FieldAttributeAppender>();
  const entries: CompiledFieldRule[] = [];

  for (const rule of fieldRules(registry)) {
    const matcher = resolveLatentMatcher(rule.matcher, instrumentedType);

    const factoryKey = stableAttributeAppenderFactoryKey(
      rule.attributeAppenderFactory
    );
    let attributeAppender = appenders.get(factoryKey);
    if (attributeAppender === undefined) {
      attributeAppender = makeFieldAttributeAppender(
        rule.attributeAppenderFactory,
        instrumentedType
      );
      appenders.set(factoryKey, attributeAppender);
    }

    entries.push({
      matcher,
      attributeAppender,
      ...(rule.defaultValue !== undefined
        ? { defaultValue: rule.defaultValue }
        : {}),
      transformer: rule.transformer,
    });
  }

  logger.debug(
    `Compiled field registry for ${instrumentedType.name}: ${entries.length} rule(s), ${appenders.size} attribute appender(s)`
  );

  const trace =
    options.traceResolution === true ? options.logger : undefined;

  return {
    kind: "compiled",
    instrumentedType,
    entries,
    ...(trace !== undefined ? { trace } : {}),
  };
};
