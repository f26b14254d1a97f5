import { config as loadDotEnv } from "dotenv"

loadDotEnv()

export interface EnvConfig {
  userAgent: string | null
  robotsUrl: string | null
  productPrefix: string | null
}

const readNonEmpty = (name: string): string | null => {
  const value = process.env[name]?.trim()
  return value ? value : null
}

export const readEnvConfig = (): EnvConfig => ({
  userAgent: readNonEmpty("HARVEST_USER_AGENT"),
  robotsUrl: readNonEmpty("HARVEST_ROBOTS_URL"),
  productPrefix: readNonEmpty("HARVEST_PRODUCT_PREFIX"),
})
