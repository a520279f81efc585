export const SCRAPING_CONFIG = {
  // Retry configuration
  MAX_NAVIGATION_ATTEMPTS: 3,
  INITIAL_RETRY_DELAY: 1000, // 1 second
  MAX_RETRY_DELAY: 10000, // 10 seconds
  BACKOFF_MULTIPLIER: 2,

  // Browser configuration
  NAVIGATION_TIMEOUT: 30000, // 30 seconds
  WAIT_FOR_SELECTOR_TIMEOUT: 15000, // 15 seconds
  SETTLE_DELAY: 1500,
  VIEWPORT: { width: 1366, height: 768 },

  USER_AGENT:
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',

  // Request headers
  DEFAULT_HEADERS: {
    'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.5',
    'DNT': '1',
    'Upgrade-Insecure-Requests': '1'
  }
} as const;

export const LUMA_CONFIG = {
  BASE_URL: 'https://lu.ma',
  DISCOVER_PATH: '/discover',

  // Paths on the site host that are never event pages
  NON_EVENT_PATHS: [
    '/discover',
    '/signin',
    '/login',
    '/create',
    '/home',
    '/explore',
    '/pricing',
    '/calendar',
    '/user',
    '/terms',
    '/privacy'
  ],

  SEARCH_SELECTORS: {
    searchInput: '[data-testid="search-input"], input[type="search"], input[placeholder*="Search"]',
    searchSubmit: '[data-testid="search-submit"], button[type="submit"]',
    locationInput: '[data-testid="location-input"], input[placeholder*="Location"], input[name="location"]',
    categoryInput: '[data-testid="category-input"], input[name="category"]',
    resultLink: 'a.event-link, a.content-link, a[data-testid="event-card"]',
    resultTitle: '[data-testid="event-name"], .event-title, h3',
    resultDate: 'time, .event-time, .date',
    resultLocation: '.event-location, .location',
    loadMore: '[data-testid="load-more"], button.load-more, a[rel="next"]'
  },

  SELECTORS: {
    eventTitle: 'h1[data-testid="event-title"], h1.title, h1',
    eventDate: 'time[datetime], [data-testid="event-date"], .event-time, .date',
    eventLocation: '[data-testid="event-location"], .event-location, .location',
    eventDescription: '[data-testid="event-description"], .event-description, .description',
    speakerCard: '[data-testid="speaker"], .speaker-card, .speaker',
    hostCard: '[data-testid="host"], .host-card, .host',
    sponsorCard: '[data-testid="sponsor"], .sponsor-card, .sponsor',
    profileName: '[data-testid="name"], .name',
    profileTitle: '[data-testid="title"], .role, .title',
    profileCompany: '[data-testid="company"], .company',
    profileBio: '[data-testid="bio"], .bio',
    profileImage: 'img[src]',
    profileWebsite: 'a[href]'
  }
} as const;

export type SearchSelectors = { [K in keyof typeof LUMA_CONFIG.SEARCH_SELECTORS]: string };
export type DetailSelectors = { [K in keyof typeof LUMA_CONFIG.SELECTORS]: string };
