import type { Device } from '@luma.gl/core'
import type { BoardConfigInterface } from '@/board/config'
import type { BoardData } from '@/board/modules/BoardData'
import type { Store } from '@/board/modules/Store'

export class CoreModule {
  public readonly device: Device
  public readonly config: BoardConfigInterface
  public readonly store: Store
  public readonly data: BoardData

  public constructor (
    device: Device,
    config: BoardConfigInterface,
    store: Store,
    data: BoardData
  ) {
    this.device = device
    this.config = config
    this.store = store
    this.data = data
  }
}
