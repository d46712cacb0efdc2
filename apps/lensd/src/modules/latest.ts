/**
 * Serve a value already serialized by its cell, so repeated reads between
 * publishes return the same bytes.
 */
export function jsonResponse(json: string): Response {
  return new Response(json, {
    headers: { 'content-type': 'application/json; charset=utf-8' },
  });
}
