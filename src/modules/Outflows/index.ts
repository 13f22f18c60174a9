import { Buffer, UniformStore, type RenderPass } from '@luma.gl/core'
import { Model } from '@luma.gl/engine'
import { CoreModule } from '@/board/modules/core-module'
import {
  VERTICES_PER_OUTFLOW, getOutflowGeometry, getOutflowSegment, isSameCellPair, pushSegmentQuad,
  type OutflowHighlight,
} from '@/board/modules/Outflows/geometry'
import type { CellPair } from '@/board/modules/SquareGrid'
import type { Mat4Array } from '@/board/modules/Transform'
import drawOutflowsVert from '@/board/modules/Outflows/draw-outflows.vert?raw'
import drawOutflowsFrag from '@/board/modules/Outflows/draw-outflows.frag?raw'
import { getRgbaColor } from '@/board/helper'
import { defaultConfigValues } from '@/board/variables'

type OutflowUniforms = {
  transformationMatrix: Mat4Array;
  color: [number, number, number, number];
}

/**
 * Draws every outflow as a line from its cell's center to the side it flows through,
 * and on top of them the outflow the pointer is on.
 */
export class Outflows extends CoreModule {
  private drawOutflowsCommand: Model | undefined
  private drawHighlightCommand: Model | undefined
  private outflowBuffer: Buffer | undefined
  private highlightBuffer: Buffer | undefined
  private outflowVertexCount = 0
  private highlight: OutflowHighlight | undefined
  /** Outflow whose rectangle `highlightBuffer` holds. */
  private highlightBufferOutflow: CellPair | undefined
  private outflowUniformStore: UniformStore<{ outflowUniforms: OutflowUniforms }> | undefined
  private highlightUniformStore: UniformStore<{ outflowUniforms: OutflowUniforms }> | undefined

  public initPrograms (): void {
    const { device, config } = this
    if (!this.outflowBuffer) this.updateGeometry()
    this.highlightBuffer ||= device.createBuffer({
      data: new Float32Array(VERTICES_PER_OUTFLOW * 2),
      usage: Buffer.VERTEX | Buffer.COPY_DST,
    })

    this.outflowUniformStore ||= this.createUniformStore(config.outflowColor ?? defaultConfigValues.outflowColor)
    this.highlightUniformStore ||= this.createUniformStore(config.hoveredOutflowColor ?? defaultConfigValues.hoveredOutflowColor)

    this.drawOutflowsCommand ||= this.createModel(this.outflowBuffer, this.outflowVertexCount, this.outflowUniformStore)
    this.drawHighlightCommand ||= this.createModel(this.highlightBuffer, VERTICES_PER_OUTFLOW, this.highlightUniformStore)
  }

  public draw (renderPass: RenderPass): void {
    const { config, store } = this
    const transformationMatrix = store.transformationMatrix4x4

    if (this.drawOutflowsCommand && this.outflowUniformStore && this.outflowVertexCount) {
      this.outflowUniformStore.setUniforms({
        outflowUniforms: {
          transformationMatrix,
          color: getRgbaColor(config.outflowColor ?? defaultConfigValues.outflowColor),
        },
      })
      this.drawOutflowsCommand.draw(renderPass)
    }

    if (this.drawHighlightCommand && this.highlightUniformStore && this.highlight &&
      isSameCellPair(this.highlight.outflow, this.highlightBufferOutflow)) {
      const color = this.highlight.state === 'active'
        ? config.activeOutflowColor ?? defaultConfigValues.activeOutflowColor
        : config.hoveredOutflowColor ?? defaultConfigValues.hoveredOutflowColor
      this.highlightUniformStore.setUniforms({
        outflowUniforms: { transformationMatrix, color: getRgbaColor(color) },
      })
      this.drawHighlightCommand.draw(renderPass)
    }
  }

  public updateGeometry (): void {
    const { device, data, config } = this
    const points = getOutflowGeometry(data.grid, data.outflows, config.outflowWidth ?? defaultConfigValues.outflowWidth)
    this.outflowVertexCount = points.length / 2

    if (!this.outflowBuffer || this.outflowBuffer.destroyed || this.outflowBuffer.byteLength !== points.byteLength) {
      if (this.outflowBuffer && !this.outflowBuffer.destroyed) {
        this.outflowBuffer.destroy()
      }
      this.outflowBuffer = device.createBuffer({
        data: points,
        usage: Buffer.VERTEX | Buffer.COPY_DST,
      })
    } else {
      this.outflowBuffer.write(points)
    }

    if (this.drawOutflowsCommand) {
      this.drawOutflowsCommand.setAttributes({ point: this.outflowBuffer })
      this.drawOutflowsCommand.setVertexCount(this.outflowVertexCount)
    }
    // The grid or the width may have changed
    this.highlight = undefined
    this.highlightBufferOutflow = undefined
  }

  /**
   * Sets the outflow drawn on top of the others. The buffer is only rewritten when the outflow changes.
   */
  public setHighlight (highlight: OutflowHighlight | undefined): void {
    const { config, data } = this
    this.highlight = highlight && data.grid.areNeighbors(highlight.outflow[0], highlight.outflow[1]) ? highlight : undefined
    if (!this.highlight || !this.highlightBuffer || isSameCellPair(this.highlight.outflow, this.highlightBufferOutflow)) return

    const [start, end] = getOutflowSegment(data.grid, this.highlight.outflow)
    const points = new Float32Array(VERTICES_PER_OUTFLOW * 2)
    pushSegmentQuad(points, 0, start, end, (config.outflowWidth ?? defaultConfigValues.outflowWidth) / 2)
    this.highlightBuffer.write(points)
    this.highlightBufferOutflow = this.highlight.outflow
  }

  /**
   * Destruction order matters
   * Models -> UniformStores -> Buffers
   */
  public destroy (): void {
    this.drawOutflowsCommand?.destroy()
    this.drawOutflowsCommand = undefined
    this.drawHighlightCommand?.destroy()
    this.drawHighlightCommand = undefined

    this.outflowUniformStore?.destroy()
    this.outflowUniformStore = undefined
    this.highlightUniformStore?.destroy()
    this.highlightUniformStore = undefined

    for (const buffer of [this.outflowBuffer, this.highlightBuffer]) {
      if (buffer && !buffer.destroyed) buffer.destroy()
    }
    this.outflowBuffer = undefined
    this.highlightBuffer = undefined
    this.highlight = undefined
    this.highlightBufferOutflow = undefined
  }

  private createUniformStore (color: string | [number, number, number, number]): UniformStore<{ outflowUniforms: OutflowUniforms }> {
    return new UniformStore({
      outflowUniforms: {
        uniformTypes: {
          transformationMatrix: 'mat4x4<f32>',
          color: 'vec4<f32>',
        },
        defaultUniforms: {
          transformationMatrix: this.store.transformationMatrix4x4,
          color: getRgbaColor(color),
        },
      },
    })
  }

  private createModel (
    buffer: Buffer | undefined,
    vertexCount: number,
    uniformStore: UniformStore<{ outflowUniforms: OutflowUniforms }>
  ): Model {
    return new Model(this.device, {
      vs: drawOutflowsVert,
      fs: drawOutflowsFrag,
      topology: 'triangle-list',
      vertexCount,
      attributes: {
        ...buffer && { point: buffer },
      },
      bufferLayout: [
        { name: 'point', format: 'float32x2' },
      ],
      bindings: {
        outflowUniforms: uniformStore.getManagedUniformBuffer(this.device, 'outflowUniforms'),
      },
      parameters: {
        blend: true,
        blendColorOperation: 'add',
        blendColorSrcFactor: 'src-alpha',
        blendColorDstFactor: 'one-minus-src-alpha',
        blendAlphaOperation: 'add',
        blendAlphaSrcFactor: 'one',
        blendAlphaDstFactor: 'one-minus-src-alpha',
        depthWriteEnabled: false,
        depthCompare: 'always',
      },
    })
  }
}
