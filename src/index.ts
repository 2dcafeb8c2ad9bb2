export * from './types/motor'
export * from './services/motor-protocol'
export * from './services/byte-transport'
export * from './services/motor-session'
export * from './services/motor-experiment'
export * from './services/config-store'
export { SerialLink, serialLinkUri } from './services/link/serial'
export type { ByteLink } from './services/link/serial'
