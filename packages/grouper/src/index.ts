// Host content model
export * from '@sitekit/grouper-content'

// Grouping engine
export * from '@sitekit/grouper-engine'

// Utilities
export * from '@sitekit/grouper-utils'
