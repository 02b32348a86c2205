import type { StartedResource } from 'braided'
import { defineResource } from 'braided'
import type { DisplayDevice } from '../display/displayDevice'

/**
 * Display resource: opens the device at start, closes it at halt.
 * The pipeline and the frame loop depend on it, so it closes after both.
 */
export const createDisplayResource = <TDevice extends DisplayDevice>(open: () => TDevice) =>
  defineResource({
    dependencies: [] as const,
    start: (): TDevice => {
      const device = open()
      console.log(
        `[Display] Opened ${device.id} (${device.size.width}x${device.size.height})`,
      )
      return device
    },
    halt: async (device: TDevice) => {
      await device.close()
    },
  })

export type DisplayResource = StartedResource<ReturnType<typeof createDisplayResource>>
