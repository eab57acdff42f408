export interface LanguageConfig {
  code: string;
  name: string;
  native_name: string;
  rtl: boolean;
}

export const SUPPORTED_LANGUAGES = {
  en: { code: 'en', name: 'English', native_name: 'English', rtl: false },
  es: { code: 'es', name: 'Spanish', native_name: 'Español', rtl: false },
  fr: { code: 'fr', name: 'French', native_name: 'Français', rtl: false },
  de: { code: 'de', name: 'German', native_name: 'Deutsch', rtl: false },
  zh: { code: 'zh', name: 'Chinese', native_name: '中文', rtl: false },
  ja: { code: 'ja', name: 'Japanese', native_name: '日本語', rtl: false },
  hi: { code: 'hi', name: 'Hindi', native_name: 'हिन्दी', rtl: false },
  ar: { code: 'ar', name: 'Arabic', native_name: 'العربية', rtl: true },
  pt: { code: 'pt', name: 'Portuguese', native_name: 'Português', rtl: false },
  ru: { code: 'ru', name: 'Russian', native_name: 'Русский', rtl: false },
} as const satisfies Record<string, LanguageConfig>;

export type LanguageCode = keyof typeof SUPPORTED_LANGUAGES;

export const LANGUAGE_CODES = Object.keys(SUPPORTED_LANGUAGES).filter(isSupportedLanguage);

export function isSupportedLanguage(code: string): code is LanguageCode {
  return Object.prototype.hasOwnProperty.call(SUPPORTED_LANGUAGES, code);
}

export function getLanguageConfig(code: string): LanguageConfig | null {
  return isSupportedLanguage(code) ? SUPPORTED_LANGUAGES[code] : null;
}
