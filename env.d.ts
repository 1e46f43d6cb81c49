declare global {
  namespace NodeJS {
    interface ProcessEnv {
      COUNTRY_CODES_FILE?: string
      ADMIN_REGIONS_FILE?: string
      OUTPUT_FILE?: string
      COUNTRY_EXPORT_DIR?: string
      EXPORT_BY_COUNTRY?: string
      GEOJSON_FILE?: string
      DISPLAY_FILTER?: string
      DISPLAY_MARKER?: string
      PRIMARY_LANGUAGE?: string
      COMMON_LANGUAGES?: string
      TOP_COUNTRIES?: string
      // ADM1 subdivision report
      SUBDIVISIONS_FILE?: string
      SUBDIVISIONS_OUTPUT_FILE?: string
    }
  }
}

export {}
