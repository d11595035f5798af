// Public API for consumption by other packages (dashboard)

export * from './schedule/index.js'
