import { z } from 'zod'
import { isHexColor } from '../chart'
import { UnknownSymbolError } from '../dashboard/errors'
import type { SymbolStyle } from '../models'

/**
 * Schema for one registry entry
 * @property {string} symbol - Exchange-unified pair, BASE/QUOTE
 * @property {string} displayName - Long name for metric panels
 * @property {string} shortName - Must equal the base asset of the pair
 * @property {string} color - '#rrggbb' line color
 * @property {number} slot - Output position, 0-based
 */
const styleSchema = z
  .object({
    symbol: z.string().regex(/^[A-Z0-9]{2,10}\/[A-Z0-9]{2,10}$/),
    displayName: z.string().min(1),
    shortName: z.string().min(1),
    color: z.string().refine(isHexColor, { message: 'Color must be #rrggbb' }),
    slot: z.number().int().nonnegative()
  })
  .refine((style) => style.symbol.split('/')[0] === style.shortName, {
    message: 'shortName must be the base asset of the symbol'
  })

const registrySchema = z
  .array(styleSchema)
  .min(1)
  .refine((styles) => new Set(styles.map((s) => s.symbol)).size === styles.length, {
    message: 'Symbols must be unique'
  })
  .refine((styles) => new Set(styles.map((s) => s.slot)).size === styles.length, {
    message: 'Slots must be unique'
  })

/**
 * Validates a list of symbol styles and returns them ordered by slot
 * @throws Error listing every schema issue
 */
export function createSymbolRegistry(styles: unknown): readonly SymbolStyle[] {
  const result = registrySchema.safeParse(styles)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const where = issue.path.length > 0 ? `${issue.path.map(String).join('.')}: ` : ''
      return `${where}${issue.message}`
    })
    throw new Error(`Invalid symbol registry: ${issues.join('; ')}`)
  }

  return Object.freeze(
    [...result.data]
      .sort((a, b) => a.slot - b.slot)
      .map((style) => Object.freeze(style))
  )
}

/**
 * The pairs shown on the dashboard. Validated when this module loads.
 */
export const SYMBOL_REGISTRY = createSymbolRegistry([
  { symbol: 'BTC/USDT', displayName: 'Bitcoin', shortName: 'BTC', color: '#f7931a', slot: 0 },
  { symbol: 'ETH/USDT', displayName: 'Ethereum', shortName: 'ETH', color: '#62688f', slot: 1 },
  { symbol: 'SOL/USDT', displayName: 'Solana', shortName: 'SOL', color: '#00ff9d', slot: 2 }
])

export const SYMBOLS: readonly string[] = SYMBOL_REGISTRY.map((style) => style.symbol)

/**
 * @throws UnknownSymbolError for symbols outside the registry
 */
export function getSymbolStyle(
  symbol: string,
  registry: readonly SymbolStyle[] = SYMBOL_REGISTRY
): SymbolStyle {
  const style = registry.find((entry) => entry.symbol === symbol)
  if (!style) {
    throw new UnknownSymbolError(symbol)
  }
  return style
}
