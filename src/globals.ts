import { loadStubConfig, type StubConfig, type StubConfigInput } from './config.js';
import { UnstubContext } from './context.js';
import { StubConfigError } from './errors.js';
import type { Language } from './language.js';
import { installLanguageStubs, type LanguageSettings, type LanguageStubsOptions } from './language-stubs.js';
import { hasProcessGlobal, processGlobal, releaseProcessGlobal } from './singleton.js';

/**
 * Slots of the process-wide context. Add your own through declaration merging:
 *
 * ```ts
 * declare module 'lazy-globals' {
 *   interface GlobalSlots {
 *     parser: Parser;
 *   }
 * }
 * ```
 */
export interface GlobalSlots {
  contentLanguage: Language;
  userLanguage: Language;
}

interface DefaultGlobals {
  config: StubConfig;
  context: UnstubContext<GlobalSlots>;
}

const DEFAULT_GLOBALS = 'lazy-globals:context';

function defaultGlobals(overrides?: StubConfigInput): DefaultGlobals {
  if (overrides !== undefined && hasProcessGlobal(DEFAULT_GLOBALS)) {
    throw new StubConfigError('The default context already exists; pass overrides on first use only', []);
  }
  return processGlobal(DEFAULT_GLOBALS, () => {
    const config = loadStubConfig(process.env, overrides);
    const context = new UnstubContext<GlobalSlots>({
      name: 'globals',
      maxUnstubDepth: config.maxUnstubDepth,
      logger: config.debug ? console.debug : undefined,
    });
    return { config, context };
  });
}

/**
 * The context shared by the whole process, configured from the environment on first use.
 *
 * @throws StubConfigError when `overrides` are given after the context was created
 */
export function defaultContext(overrides?: StubConfigInput): UnstubContext<GlobalSlots> {
  return defaultGlobals(overrides).context;
}

/** The configuration the default context was created with */
export function defaultConfig(): StubConfig {
  return defaultGlobals().config;
}

export type DefaultLanguageStubsOptions = Omit<LanguageStubsOptions, 'settings'> & {
  /** Defaults to the loaded configuration, i.e. `LAZY_GLOBALS_LANGUAGE_CODE` */
  settings?: LanguageSettings;
};

/** Install the language stubs into the default context */
export function installDefaultLanguageStubs(options: DefaultLanguageStubsOptions) {
  const { config, context } = defaultGlobals();
  return installLanguageStubs(context, { ...options, settings: options.settings ?? config });
}

/** Tear down the process-wide context so the next `defaultContext()` starts empty. For test harnesses */
export function resetDefaultContext() {
  if (!hasProcessGlobal(DEFAULT_GLOBALS)) return;
  defaultGlobals().context.teardown();
  releaseProcessGlobal(DEFAULT_GLOBALS);
}
