import type { Locator } from "./driver.ts";

// ── Listing site layout ──────────────────────────────────────────────
//
// Everything the pipeline knows about the listings site's markup lives
// here. When the site changes its markup, this table is the only place
// that needs editing.

export interface SiteLayout {
  jobsUrl: string;
  signInButton: Locator;
  emailField: Locator;
  passwordField: Locator;
  securityCheck: Locator;
  searchBox: Locator;
  datePostedFilter: Locator;
  showResults: Locator;
  locationFilter: Locator;
  distanceEdit: Locator;
  distanceSlider: Locator;
  periodOption: (period: string) => Locator;
  resultsContainer: Locator;
  card: Locator;
  detailPanel: Locator;
  repostedMarker: Locator;
  applyLink: Locator;
  nextPage: Locator;
}

export const LISTING_SITE: SiteLayout = {
  jobsUrl: "https://www.linkedin.com/jobs/",
  signInButton: { role: "button", name: "Sign in" },
  emailField: { label: "Email or phone" },
  passwordField: { label: "Password" },
  securityCheck: { text: "security check" },
  searchBox: { placeholder: "Describe the job you want" },
  datePostedFilter: { xpath: "//*[@aria-label='Date posted']/.." },
  showResults: { role: "button", name: "Show results" },
  locationFilter: { css: "svg#location-marker-small" },
  distanceEdit: { css: "svg#edit-small" },
  distanceSlider: { css: 'input[type="range"][aria-label^="Slider"]' },
  periodOption: (period) => ({ role: "radio", name: period }),
  resultsContainer: { css: 'div[componentkey="SearchResultsMainContent"]' },
  card: { css: 'div[data-view-name="job-search-job-card"] div[role="button"]' },
  detailPanel: { xpath: "//h2[normalize-space()='About the job']/../.." },
  repostedMarker: { text: "Reposted" },
  applyLink: { css: "a[data-view-name='job-apply-button']" },
  nextPage: { css: "button[data-testid*='pagination-controls-next-button-visible']" },
};
