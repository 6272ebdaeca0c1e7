export { WatchlistManager, type WatchlistOptions } from './watchlist-manager.js'
