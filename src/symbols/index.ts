export {
  SYMBOLS,
  SYMBOL_REGISTRY,
  createSymbolRegistry,
  getSymbolStyle
} from './symbol-registry'
