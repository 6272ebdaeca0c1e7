/**
 * Type for job run status information
 */
export interface JobRunInfo {
  time: string
  status: 'completed' | 'failed' | 'pending'
  error?: string
  estimated?: boolean
}

/**
 * Type for configuration of interval jobs
 */
export interface IntervalConfig {
  days?: number
  hours?: number
  minutes?: number
  seconds?: number
  runImmediately?: boolean
}

export interface JobStatus {
  name: string
  intervalSeconds: number
  running: boolean
  lastRun: JobRunInfo | null
  nextRun: JobRunInfo | null
}
