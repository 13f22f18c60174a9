import { Buffer, UniformStore, type Framebuffer, type RenderPass } from '@luma.gl/core'
import { Model } from '@luma.gl/engine'
import { CoreModule } from '@/board/modules/core-module'
import { circleAtlasModule } from '@/board/modules/Atlas/circle-atlas-module'
import { buildFillGeometry, buildPickGeometry, type CellGeometry } from '@/board/modules/Cells/geometry'
import type { Mat4Array } from '@/board/modules/Transform'
import drawCellsVert from '@/board/modules/Cells/draw-cells.vert?raw'
import drawFillsFrag from '@/board/modules/Cells/draw-fills.frag?raw'
import drawIdsFrag from '@/board/modules/Cells/draw-ids.frag?raw'
import { getRgbaColor } from '@/board/helper'
import { defaultConfigValues } from '@/board/variables'

type AtlasUniforms = {
  transformationMatrix: Mat4Array;
  sentinelColor: [number, number, number, number];
  spacing: number;
  indexBase: number;
  outOfRangePolicy: number;
}

/**
 * Draws every cell twice from the same vertex stage: the visible fill circles onto the canvas,
 * and the cell identifiers into an offscreen framebuffer for picking.
 */
export class Cells extends CoreModule {
  public pickFbo: Framebuffer | undefined
  private drawFillsCommand: Model | undefined
  private drawIdsCommand: Model | undefined
  private fillPointBuffer: Buffer | undefined
  private fillAtlasCoordBuffer: Buffer | undefined
  private pickPointBuffer: Buffer | undefined
  private pickAtlasCoordBuffer: Buffer | undefined
  private fillVertexCount = 0
  private pickVertexCount = 0
  private atlasUniformStore: UniformStore<{ atlasUniforms: AtlasUniforms }> | undefined

  public initPrograms (): void {
    const { device } = this

    if (!this.fillPointBuffer || !this.fillAtlasCoordBuffer) this.updateFills()
    if (!this.pickPointBuffer || !this.pickAtlasCoordBuffer) this.updatePickGeometry()
    this.updatePickFbo()

    this.atlasUniformStore ||= new UniformStore({
      atlasUniforms: {
        uniformTypes: {
          transformationMatrix: 'mat4x4<f32>',
          sentinelColor: 'vec4<f32>',
          spacing: 'f32',
          indexBase: 'f32',
          outOfRangePolicy: 'f32',
        },
        defaultUniforms: this.getAtlasUniforms(),
      },
    })

    this.drawFillsCommand ||= new Model(device, {
      vs: drawCellsVert,
      fs: drawFillsFrag,
      modules: [circleAtlasModule],
      topology: 'triangle-list',
      vertexCount: this.fillVertexCount,
      attributes: {
        ...this.fillPointBuffer && { point: this.fillPointBuffer },
        ...this.fillAtlasCoordBuffer && { atlasCoord: this.fillAtlasCoordBuffer },
      },
      bufferLayout: [
        { name: 'point', format: 'float32x2' },
        { name: 'atlasCoord', format: 'float32x2' },
      ],
      bindings: {
        atlasUniforms: this.atlasUniformStore.getManagedUniformBuffer(device, 'atlasUniforms'),
      },
      parameters: {
        depthWriteEnabled: false,
        depthCompare: 'always',
      },
    })

    this.drawIdsCommand ||= new Model(device, {
      vs: drawCellsVert,
      fs: drawIdsFrag,
      modules: [circleAtlasModule],
      topology: 'triangle-list',
      vertexCount: this.pickVertexCount,
      attributes: {
        ...this.pickPointBuffer && { point: this.pickPointBuffer },
        ...this.pickAtlasCoordBuffer && { atlasCoord: this.pickAtlasCoordBuffer },
      },
      bufferLayout: [
        { name: 'point', format: 'float32x2' },
        { name: 'atlasCoord', format: 'float32x2' },
      ],
      bindings: {
        atlasUniforms: this.atlasUniformStore.getManagedUniformBuffer(device, 'atlasUniforms'),
      },
      // Identifiers are exact colors: no blending
      parameters: {
        blend: false,
        depthWriteEnabled: false,
        depthCompare: 'always',
      },
    })
  }

  public draw (renderPass: RenderPass): void {
    if (!this.drawFillsCommand || !this.atlasUniformStore || !this.fillVertexCount) return
    this.atlasUniformStore.setUniforms({ atlasUniforms: this.getAtlasUniforms() })
    this.drawFillsCommand.draw(renderPass)
  }

  /**
   * Renders the cell identifiers into `pickFbo`. Pixels outside every cell stay transparent black.
   */
  public drawIds (): void {
    const { device } = this
    if (!this.drawIdsCommand || !this.atlasUniformStore || !this.pickFbo || this.pickFbo.destroyed) return
    this.atlasUniformStore.setUniforms({ atlasUniforms: this.getAtlasUniforms() })

    const idsPass = device.beginRenderPass({
      framebuffer: this.pickFbo,
      clearColor: [0, 0, 0, 0],
    })
    if (this.pickVertexCount) this.drawIdsCommand.draw(idsPass)
    idsPass.end()
  }

  public updateFills (): void {
    const { config } = this
    const geometry = buildFillGeometry(this.data, {
      spacing: config.atlasSpacing ?? defaultConfigValues.atlasSpacing,
      indexBase: config.atlasIndexBase ?? defaultConfigValues.atlasIndexBase,
      maxFill: config.maxFill ?? defaultConfigValues.maxFill,
      fillScale: config.fillScale ?? defaultConfigValues.fillScale,
    })
    this.fillPointBuffer = this.writeBuffer(this.fillPointBuffer, geometry.points)
    this.fillAtlasCoordBuffer = this.writeBuffer(this.fillAtlasCoordBuffer, geometry.atlasCoords)
    this.fillVertexCount = geometry.vertexCount
    this.updateModel(this.drawFillsCommand, geometry, this.fillPointBuffer, this.fillAtlasCoordBuffer)
  }

  public updatePickGeometry (): void {
    const { config } = this
    const geometry = buildPickGeometry(this.data, {
      spacing: config.atlasSpacing ?? defaultConfigValues.atlasSpacing,
      indexBase: config.atlasIndexBase ?? defaultConfigValues.atlasIndexBase,
    })
    this.pickPointBuffer = this.writeBuffer(this.pickPointBuffer, geometry.points)
    this.pickAtlasCoordBuffer = this.writeBuffer(this.pickAtlasCoordBuffer, geometry.atlasCoords)
    this.pickVertexCount = geometry.vertexCount
    this.updateModel(this.drawIdsCommand, geometry, this.pickPointBuffer, this.pickAtlasCoordBuffer)
  }

  /**
   * Keeps `pickFbo` the size of the canvas drawing buffer, so one of its pixels is one canvas pixel.
   */
  public updatePickFbo (): void {
    const { device, store: { drawingBufferSize } } = this
    const [width, height] = drawingBufferSize
    if (!width || !height) return
    if (this.pickFbo && !this.pickFbo.destroyed && this.pickFbo.width === width && this.pickFbo.height === height) return

    if (this.pickFbo && !this.pickFbo.destroyed) {
      this.pickFbo.destroy()
    }
    this.pickFbo = device.createFramebuffer({
      width,
      height,
      colorAttachments: ['rgba8unorm'],
    })
  }

  /**
   * Destruction order matters
   * Models -> Framebuffers -> UniformStores -> Buffers
   */
  public destroy (): void {
    this.drawFillsCommand?.destroy()
    this.drawFillsCommand = undefined
    this.drawIdsCommand?.destroy()
    this.drawIdsCommand = undefined

    if (this.pickFbo && !this.pickFbo.destroyed) {
      this.pickFbo.destroy()
    }
    this.pickFbo = undefined

    this.atlasUniformStore?.destroy()
    this.atlasUniformStore = undefined

    for (const buffer of [this.fillPointBuffer, this.fillAtlasCoordBuffer, this.pickPointBuffer, this.pickAtlasCoordBuffer]) {
      if (buffer && !buffer.destroyed) buffer.destroy()
    }
    this.fillPointBuffer = undefined
    this.fillAtlasCoordBuffer = undefined
    this.pickPointBuffer = undefined
    this.pickAtlasCoordBuffer = undefined
  }

  private getAtlasUniforms (): AtlasUniforms {
    const { config, store } = this
    return {
      transformationMatrix: store.transformationMatrix4x4,
      sentinelColor: getRgbaColor(config.sentinelColor ?? defaultConfigValues.sentinelColor),
      spacing: config.atlasSpacing ?? defaultConfigValues.atlasSpacing,
      indexBase: config.atlasIndexBase ?? defaultConfigValues.atlasIndexBase,
      outOfRangePolicy: (config.outOfRangePolicy ?? defaultConfigValues.outOfRangePolicy) === 'sentinel' ? 1 : 0,
    }
  }

  /**
   * Buffers can't be resized: a buffer of another size is recreated.
   */
  private writeBuffer (buffer: Buffer | undefined, data: Float32Array): Buffer {
    if (buffer && !buffer.destroyed && buffer.byteLength === data.byteLength) {
      buffer.write(data)
      return buffer
    }
    if (buffer && !buffer.destroyed) buffer.destroy()
    return this.device.createBuffer({
      data,
      usage: Buffer.VERTEX | Buffer.COPY_DST,
    })
  }

  private updateModel (model: Model | undefined, geometry: CellGeometry, pointBuffer: Buffer, atlasCoordBuffer: Buffer): void {
    if (!model) return
    model.setAttributes({
      point: pointBuffer,
      atlasCoord: atlasCoordBuffer,
    })
    model.setVertexCount(geometry.vertexCount)
  }
}
