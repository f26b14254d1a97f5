import { stat } from "node:fs/promises"

import { isMissingPathError } from "./errors.js"

export const pathExists = async (path: string): Promise<boolean> => {
  try {
    await stat(path)
    return true
  } catch (error: unknown) {
    if (isMissingPathError(error)) {
      return false
    }
    throw error
  }
}
