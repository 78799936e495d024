/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_WDI_DATASET?: string
}

interface ImportMeta {
  readonly env: ImportMetaEnv
}
