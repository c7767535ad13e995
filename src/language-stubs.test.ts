import { describe, expect, test } from 'vitest';
import { UnstubContext } from './context.js';
import type { GlobalSlots } from './globals.js';
import type { Language, RequestContext } from './language.js';
import { ContentLanguageStub, UserLanguageStub, installLanguageStubs } from './language-stubs.js';
import { isRealObject } from './stub-object.js';

class FakeLanguage implements Language {
  static created: string[] = [];
  readonly steps: string[] = [];

  constructor(private readonly code: string) {
    FakeLanguage.created.push(code);
  }

  getCode() {
    return this.code;
  }

  initEncoding() {
    this.steps.push('encoding');
  }

  initContentLanguage() {
    this.steps.push('content-language');
  }

  getDir(): 'ltr' | 'rtl' {
    return this.code === 'he' ? 'rtl' : 'ltr';
  }

  formatNum(value: number) {
    return value.toFixed(1);
  }

  ucfirst(text: string) {
    return text.charAt(0).toUpperCase() + text.slice(1);
  }

  message(key: string, ...params: string[]) {
    return [this.code, key, ...params].join(':');
  }
}

function setup(languageCode = 'en') {
  FakeLanguage.created = [];
  const context = new UnstubContext<GlobalSlots>();
  const settings = { languageCode };
  const factory = (code: string) => new FakeLanguage(code);
  return { context, settings, factory };
}

describe('ContentLanguageStub', () => {
  test('builds the configured language and initialises it once', () => {
    const { context, settings, factory } = setup('en');
    const stub = new ContentLanguageStub(context, { settings, factory }).install();

    expect(stub.getCode()).toBe('en');

    const real = context.registry.get('contentLanguage');
    if (!(real instanceof FakeLanguage)) throw new Error('expected the slot to hold a FakeLanguage');
    expect(real.steps).toEqual(['encoding', 'content-language']);

    expect(stub.ucfirst('hello')).toBe('Hello');
    expect(context.registry.get('contentLanguage')).toBe(real);
    expect(FakeLanguage.created).toEqual(['en']);
  });

  test('reads the language code when first used, not when created', () => {
    const { context, settings, factory } = setup('en');
    const stub = new ContentLanguageStub(context, { settings, factory }).install();

    settings.languageCode = 'he';

    expect(stub.getDir()).toBe('rtl');
    expect(FakeLanguage.created).toEqual(['he']);
  });

  test('forwards every Language method', () => {
    const { context, settings, factory } = setup('de');
    const stub = new ContentLanguageStub(context, { settings, factory }).install();

    expect(stub.formatNum(3)).toBe('3.0');
    expect(stub.message('welcome', 'Ada', 'Bob')).toBe('de:welcome:Ada:Bob');
    expect(stub.getDir()).toBe('ltr');

    stub.initEncoding();
    const real = context.registry.get('contentLanguage');
    if (!(real instanceof FakeLanguage)) throw new Error('expected the slot to hold a FakeLanguage');
    expect(real.steps).toEqual(['encoding', 'content-language', 'encoding']);
  });

  test('names the code that triggered the build', () => {
    const { context, settings, factory } = setup('en');
    const messages: string[] = [];
    context.diagnostics.events.on('debug', (message) => messages.push(message));
    const stub = new ContentLanguageStub(context, { settings, factory }).install();

    function renderHeader() {
      return stub.getCode();
    }
    renderHeader();

    expect(messages).toEqual(['Unstubbing contentLanguage on call of contentLanguage.getCode from renderHeader']);
  });
});

describe('UserLanguageStub', () => {
  test('borrows the language of the main request context', () => {
    const { context } = setup();
    const userLanguage = new FakeLanguage('fr');
    let lookups = 0;
    const mainContext = (): RequestContext => ({
      getLanguage: () => {
        lookups++;
        return userLanguage;
      },
    });
    const stub = new UserLanguageStub(context, mainContext).install();

    expect(lookups).toBe(0);
    expect(stub.message('logout')).toBe('fr:logout');
    expect(stub.getCode()).toBe('fr');

    expect(context.registry.get('userLanguage')).toBe(userLanguage);
    expect(userLanguage.steps).toEqual([]);
    expect(lookups).toBe(1);
  });
});

describe('installLanguageStubs', () => {
  test('installs both slots without building either', () => {
    const { context, settings, factory } = setup('en');
    const requestLanguage = new FakeLanguage('nl');

    const stubs = installLanguageStubs(context, {
      settings,
      factory,
      mainContext: () => ({ getLanguage: () => requestLanguage }),
    });

    expect(context.registry.slots()).toEqual(['contentLanguage', 'userLanguage']);
    expect(isRealObject(context.registry.get('contentLanguage'))).toBe(false);
    expect(isRealObject(context.registry.get('userLanguage'))).toBe(false);
    expect(FakeLanguage.created).toEqual(['nl']);

    expect(stubs.userLanguage.getCode()).toBe('nl');
    expect(stubs.contentLanguage.getCode()).toBe('en');
    expect(FakeLanguage.created).toEqual(['nl', 'en']);
  });
});
