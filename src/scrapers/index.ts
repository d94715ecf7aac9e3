// Web app scraping for guest credentials
export { extractBootstrapTarget, extractBearerToken, type BootstrapTarget } from "./bootstrap";
