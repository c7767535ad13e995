/** The parts of a language service reached through the language globals */
export interface Language {
  getCode(): string;
  /** Set up the character encoding; required before a content language is used */
  initEncoding(): void;
  /** Load what the language needs to render site content */
  initContentLanguage(): void;
  getDir(): 'ltr' | 'rtl';
  formatNum(value: number): string;
  ucfirst(text: string): string;
  message(key: string, ...params: string[]): string;
}

export type LanguageFactory = (code: string) => Language;

/** Per-request state that knows the user's language */
export interface RequestContext {
  getLanguage(): Language;
}
