/**
 * Local mirror of per-channel acquisition settings.
 *
 * The setters of the wire protocol are fire-and-forget, so the driver keeps its own copy of
 * what it last sent (range, decimation, filter) to convert incoming records without
 * re-querying the device. Only the controller's setter path writes here.
 */

import type { ChannelSettings } from '../types/waveline'
import { ALL_CHANNELS } from './waveline-protocol'
import { ValidationError } from './waveline-errors'

export type ChannelSettingsPatch = Partial<ChannelSettings>

function copySettings(settings: ChannelSettings): ChannelSettings {
  return { ...settings, filter: { ...settings.filter } }
}

/**
 *
 */
export class ChannelSettingsStore {
  private readonly settings = new Map<number, ChannelSettings>()

  /**
   *
   * @param channels - physical channel numbers (1-based)
   * @param defaults - settings every channel starts with (and returns to on reset)
   */
  constructor(
    readonly channels: readonly number[],
    private readonly defaults: ChannelSettings
  ) {
    this.reset()
  }

  /**
   * Restore defaults on every channel (on (re)connect).
   */
  reset(): void {
    this.settings.clear()
    for (const channel of this.channels) {
      this.settings.set(channel, copySettings(this.defaults))
    }
  }

  /**
   * Snapshot of one channel's settings; later updates don't affect it.
   * @param channel
   */
  get(channel: number): ChannelSettings {
    const settings = this.settings.get(channel)
    if (!settings) {
      throw new ValidationError(`No settings for channel ${channel}`)
    }
    return copySettings(settings)
  }

  /**
   * Apply a patch to one channel, or to every channel for channel 0.
   * @param channel
   * @param patch
   */
  update(channel: number, patch: ChannelSettingsPatch): void {
    const targets = channel === ALL_CHANNELS ? this.channels : [channel]
    for (const target of targets) {
      const current = this.settings.get(target)
      if (!current) {
        throw new ValidationError(`No settings for channel ${target}`)
      }
      this.settings.set(target, {
        ...current,
        ...patch,
        filter: { ...(patch.filter ?? current.filter) },
      })
    }
  }
}
