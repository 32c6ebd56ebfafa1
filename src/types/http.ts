/**
 * HTTP response status codes used by the service
 *
 * Based on [RFC 9110](https://httpwg.org/specs/rfc9110.html#overview.of.status.codes)
 */
export enum HTTP {
  /** **200 OK** */
  OK = 200,

  /** **204 No Content** - CORS preflight replies */
  NoContent = 204,

  /**
   * **400 Bad Request**
   *
   * The request body failed schema validation or carried an unusable
   * Autocrypt header.
   */
  BadRequest = 400,

  /** **404 Not Found** */
  NotFound = 404,

  /**
   * **413 Content Too Large**
   *
   * Key material exceeded `MAX_KEY_DATA_BYTES`.
   */
  ContentTooLarge = 413,

  /** **500 Internal Server Error** */
  InternalServerError = 500,
}

/** Header names the middleware reads or writes */
export const HEADERS = {
  REQUEST_ID: "X-Request-ID",
  ORIGIN: "Origin",
  CONTENT_SECURITY_POLICY: "Content-Security-Policy",
  ALLOW_ORIGIN: "Access-Control-Allow-Origin",
  ALLOW_METHODS: "Access-Control-Allow-Methods",
  ALLOW_HEADERS: "Access-Control-Allow-Headers",
  EXPOSE_HEADERS: "Access-Control-Expose-Headers",
  MAX_AGE: "Access-Control-Max-Age",
} as const;
