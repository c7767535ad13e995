import type { UnstubContext } from './context.js';
import type { GlobalSlots } from './globals.js';
import type { Language, LanguageFactory, RequestContext } from './language.js';
import { StubObject } from './stub-object.js';

type LanguageSlot = 'contentLanguage' | 'userLanguage';

export interface LanguageSettings {
  readonly languageCode: string;
}

export interface ContentLanguageStubOptions {
  /** Read when the language is built, not when the stub is created */
  settings: LanguageSettings;
  factory: LanguageFactory;
}

/**
 * Forwards the {@link Language} interface. Each method builds the real language on first use, through the
 * subclass's recipe.
 */
abstract class LanguageStub extends StubObject<GlobalSlots, LanguageSlot, []> implements Language {
  constructor(context: UnstubContext<GlobalSlots>, slotName: LanguageSlot) {
    super(context, slotName, null, []);
  }

  getCode() {
    return this.forward('getCode', []);
  }

  initEncoding() {
    this.forward('initEncoding', []);
  }

  initContentLanguage() {
    this.forward('initContentLanguage', []);
  }

  getDir() {
    return this.forward('getDir', []);
  }

  formatNum(value: number) {
    return this.forward('formatNum', [value]);
  }

  ucfirst(text: string) {
    return this.forward('ucfirst', [text]);
  }

  message(key: string, ...params: string[]) {
    return this.forward('message', [key, ...params]);
  }
}

/** The site's content language, built for the configured language code */
export class ContentLanguageStub extends LanguageStub {
  constructor(
    context: UnstubContext<GlobalSlots>,
    private readonly options: ContentLanguageStubOptions,
  ) {
    super(context, 'contentLanguage');
  }

  protected override buildRealObject(): Language {
    const language = this.options.factory(this.options.settings.languageCode);
    language.initEncoding();
    language.initContentLanguage();
    return language;
  }
}

/** The current user's language, taken as-is from the main request context */
export class UserLanguageStub extends LanguageStub {
  constructor(
    context: UnstubContext<GlobalSlots>,
    private readonly mainContext: () => RequestContext,
  ) {
    super(context, 'userLanguage');
  }

  protected override buildRealObject(): Language {
    return this.mainContext().getLanguage();
  }
}

export interface LanguageStubsOptions extends ContentLanguageStubOptions {
  mainContext: () => RequestContext;
}

/** Install both language stubs; run once during application setup */
export function installLanguageStubs(context: UnstubContext<GlobalSlots>, options: LanguageStubsOptions) {
  const contentLanguage = new ContentLanguageStub(context, options).install();
  const userLanguage = new UserLanguageStub(context, options.mainContext).install();
  return { contentLanguage, userLanguage };
}
