/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_LOCALE?: string;
  readonly VITE_TIME_ZONE?: string;
  readonly VITE_SLIDESHOW_INTERVAL_MS?: string;
  readonly VITE_INVALID_NUMBER_PLACEHOLDER?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
