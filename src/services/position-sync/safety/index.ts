export { applySafetyGate, isDirectionAllowed } from './safety-gate.js'
