export {
  TickCounters,
  type TickContext,
  createTickContext,
} from './tick-context.js'
