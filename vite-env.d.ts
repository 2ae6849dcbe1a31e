/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_LOG_LEVEL?: string;
  readonly VITE_COVID_THRESHOLD_YEAR?: string;
  readonly VITE_IQR_MULTIPLIER?: string;
  readonly VITE_SIGNIFICANCE_LEVEL?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
