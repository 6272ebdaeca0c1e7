/**
 * Global test setup
 */

export async function setup(): Promise<void> {
  process.env.NODE_ENV = 'test'
  process.env.logLevel = 'silent'
  process.env.enableFileLogging = 'false'
}
