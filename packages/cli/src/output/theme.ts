import { Chalk, type ChalkInstance, type ColorSupportLevel } from 'chalk'

export interface Theme {
  readonly info:  ChalkInstance
  readonly muted: ChalkInstance
  readonly open:  ChalkInstance
  readonly ok:    ChalkInstance
  readonly warn:  ChalkInstance
  readonly error: ChalkInstance
}

export const createTheme = (level: ColorSupportLevel): Theme => {
  const c = new Chalk({ level })
  return {
    info:  c.hex('#4FC3F7'),
    muted: c.hex('#666666'),
    open:  c.hex('#D4880A'),
    ok:    c.hex('#81C784'),
    warn:  c.hex('#D4880A'),
    error: c.hex('#CF6679'),
  } as const
}
