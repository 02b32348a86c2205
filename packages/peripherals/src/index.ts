/**
 * @lumenwall/peripherals
 *
 * Input side of the runtime: the event bus, its state store, virtual
 * peripherals derived from raw input, scripted playlists, shared streams
 * and the peripheral manager.
 */

export * from './input'
export * from './stateStore'
export * from './eventBus'
export * from './playlists'
export * from './virtualPeripherals'
export * from './gestures'
export * from './gates'
export * from './streamSharing'
export * from './peripheral'
