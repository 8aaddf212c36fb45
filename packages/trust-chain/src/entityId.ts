export const OIDCFED_WELL_KNOWN_PATH = ".well-known/openid-federation";

export const withTrailingSlash = (subject: string) => (subject.endsWith("/") ? subject : `${subject}/`);

// Entity identifiers compare equal when they differ only by one trailing slash.
export const sameEntity = (a: string, b: string) => withTrailingSlash(a) === withTrailingSlash(b);

export const entityConfigurationUrl = (subject: string) =>
  `${withTrailingSlash(subject)}${OIDCFED_WELL_KNOWN_PATH}`;

export const subordinateStatementUrl = (endpoint: string, subject: string) => {
  const url = new URL(endpoint);
  url.searchParams.set("sub", subject);
  return url.toString();
};
