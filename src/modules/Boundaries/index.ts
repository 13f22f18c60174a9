import { Buffer, UniformStore, type RenderPass } from '@luma.gl/core'
import { Model } from '@luma.gl/engine'
import { CoreModule } from '@/board/modules/core-module'
import { getBoundaryLineGeometry } from '@/board/modules/Boundaries/geometry'
import type { Mat4Array } from '@/board/modules/Transform'
import drawBoundariesVert from '@/board/modules/Boundaries/draw-boundaries.vert?raw'
import drawBoundariesFrag from '@/board/modules/Boundaries/draw-boundaries.frag?raw'
import { getRgbaColor } from '@/board/helper'
import { defaultConfigValues } from '@/board/variables'

type BoundaryUniforms = {
  transformationMatrix: Mat4Array;
  color: [number, number, number, number];
}

export class Boundaries extends CoreModule {
  private drawBoundariesCommand: Model | undefined
  private pointBuffer: Buffer | undefined
  private vertexCount = 0
  private boundaryUniformStore: UniformStore<{ boundaryUniforms: BoundaryUniforms }> | undefined

  public initPrograms (): void {
    const { device } = this
    if (!this.pointBuffer) this.updateGeometry()

    this.boundaryUniformStore ||= new UniformStore({
      boundaryUniforms: {
        uniformTypes: {
          transformationMatrix: 'mat4x4<f32>',
          color: 'vec4<f32>',
        },
        defaultUniforms: this.getBoundaryUniforms(),
      },
    })

    this.drawBoundariesCommand ||= new Model(device, {
      vs: drawBoundariesVert,
      fs: drawBoundariesFrag,
      topology: 'line-list',
      vertexCount: this.vertexCount,
      attributes: {
        ...this.pointBuffer && { point: this.pointBuffer },
      },
      bufferLayout: [
        { name: 'point', format: 'float32x2' },
      ],
      bindings: {
        boundaryUniforms: this.boundaryUniformStore.getManagedUniformBuffer(device, 'boundaryUniforms'),
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

  public draw (renderPass: RenderPass): void {
    if (!this.drawBoundariesCommand || !this.boundaryUniformStore || !this.vertexCount) return
    this.boundaryUniformStore.setUniforms({ boundaryUniforms: this.getBoundaryUniforms() })
    this.drawBoundariesCommand.draw(renderPass)
  }

  public updateGeometry (): void {
    const { device, data } = this
    const lines = getBoundaryLineGeometry(data.grid)
    this.vertexCount = lines.length / 2

    if (!this.pointBuffer || this.pointBuffer.destroyed || this.pointBuffer.byteLength !== lines.byteLength) {
      if (this.pointBuffer && !this.pointBuffer.destroyed) {
        this.pointBuffer.destroy()
      }
      this.pointBuffer = device.createBuffer({
        data: lines,
        usage: Buffer.VERTEX | Buffer.COPY_DST,
      })
    } else {
      this.pointBuffer.write(lines)
    }

    if (this.drawBoundariesCommand) {
      this.drawBoundariesCommand.setAttributes({ point: this.pointBuffer })
      this.drawBoundariesCommand.setVertexCount(this.vertexCount)
    }
  }

  /**
   * Destruction order matters
   * Models -> UniformStores -> Buffers
   */
  public destroy (): void {
    this.drawBoundariesCommand?.destroy()
    this.drawBoundariesCommand = undefined

    this.boundaryUniformStore?.destroy()
    this.boundaryUniformStore = undefined

    if (this.pointBuffer && !this.pointBuffer.destroyed) {
      this.pointBuffer.destroy()
    }
    this.pointBuffer = undefined
  }

  private getBoundaryUniforms (): BoundaryUniforms {
    const { config, store } = this
    return {
      transformationMatrix: store.transformationMatrix4x4,
      color: getRgbaColor(config.boundaryColor ?? defaultConfigValues.boundaryColor),
    }
  }
}
