/**
 * Masks credentials before a URL or error message reaches the logs:
 * `user:pass@host` userinfo, password parameters, bearer tokens and
 * `api_key` query parameters.
 */
export function redactCredentials(text: string): string {
  if (!text) return text;

  return text
    .replace(/(https?:\/\/[^:/\s]+):([^@\s]+)@/g, '$1:****@')
    .replace(/(password["\s]*[:=]["\s]*)([^"&\s,}]+)/gi, '$1****')
    .replace(/(Authorization["\s]*[:=]["\s]*)(Bearer\s+)?([^"&\s,}]+)/gi, '$1$2****')
    .replace(/([?&]api_key=)([^&\s]+)/gi, '$1****');
}
