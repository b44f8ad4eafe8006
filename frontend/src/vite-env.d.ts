/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_DEBUG_ENGINE?: string;
}
