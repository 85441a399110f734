/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_FIRE_DATA_URL?: string;
  readonly VITE_COUNTY_MAP_URL?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
