import chalk, { type ChalkInstance } from 'chalk'
import type { LogLevel } from '@switchboard/kernel'

export const t = {
  blue:       chalk.hex('#4FC3F7'),
  blueBright: chalk.hex('#81D4FA'),
  text:       chalk.hex('#C8C8C0'),
  white:      chalk.hex('#F2F2EC'),
  dim:        chalk.hex('#444444'),
  muted:      chalk.hex('#666666'),
  amber:      chalk.hex('#D4880A'),
  green:      chalk.hex('#81C784'),
  red:        chalk.hex('#CF6679'),
} as const

const _levelColors: Record<LogLevel, ChalkInstance> = {
  error:   t.red,
  warning: t.amber,
  notice:  t.blueBright,
  info:    t.text,
  debug:   t.muted,
}

export const levelColor = (level: LogLevel): ChalkInstance => _levelColors[level]

export const statusColor = (ok: boolean): ChalkInstance => (ok ? t.green : t.red)
