import { httpGetText, type HttpRequestConfig } from "../utils/http.js"

export const DEFAULT_ROBOTS_URL = "https://play.google.com/robots.txt"

const SITEMAP_DIRECTIVE = /^sitemap:\s*(\S+)/i

export const parseRobotsSitemaps = (body: string): string[] => {
  const urls: string[] = []
  for (const line of body.split(/\r?\n/)) {
    const match = SITEMAP_DIRECTIVE.exec(line.trim())
    if (match) {
      urls.push(match[1])
    }
  }
  return urls
}

export const fetchRobotsSitemaps = async (
  robotsUrl: string,
  http: HttpRequestConfig,
  signal?: AbortSignal,
): Promise<string[]> => {
  const response = await httpGetText(robotsUrl, http, signal)
  return parseRobotsSitemaps(response.body)
}
