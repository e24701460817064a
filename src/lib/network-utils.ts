/**
 * Validates if a string is a valid RPC URL
 * @param url The URL to validate
 * @returns True if the URL appears to be a valid RPC URL
 */
export function isValidRpcUrl(url: string): boolean {
  try {
    const urlObj = new URL(url)

    // The backend talks JSON-RPC over HTTP only
    const isValidProtocol = urlObj.protocol === 'http:' || urlObj.protocol === 'https:'

    return isValidProtocol && urlObj.hostname.length > 0
  } catch {
    return false
  }
}
