import type { ShaderModule } from '@luma.gl/shadertools'

/**
 * GLSL half of the procedural circle atlas, injected into both the visible and the identifier fragment programs.
 *
 * The atlas is an image that is never stored: 4096 unit circles laid out along the x axis,
 * `spacing` apart, circle `index` centered at `(index + indexBase) * spacing`.
 * Everything left of `-spacing` is blank.
 *
 * `circleAtlasColor` returns false when the fragment must be discarded.
 * The identifier program passes a zero `sentinelPolicy`, so only the visible program paints the sentinel.
 * The encoding mirrors `encodeCircleIndex` in `@/board/modules/IdCodec`: red holds bits 8..11, blue bits 4..7, green bits 0..3.
 */
const circleAtlasFS = /* glsl */ `
const float ATLAS_CAPACITY = 4096.0;

vec4 encodeCircleIndex(float index) {
  float r = floor(index / 256.0);
  float b = floor(mod(index, 256.0) / 16.0);
  float g = mod(index, 16.0);
  return vec4(r, g, b, 15.0) / 15.0;
}

bool circleAtlasColor(vec2 coord, float spacing, float indexBase, float sentinelPolicy, vec4 sentinelColor, out vec4 color) {
  color = vec4(0.0);
  if (coord.x < -spacing) return false;

  float slot = floor(coord.x / spacing + 0.5);
  float index = slot - indexBase;
  if (index < 0.0 || index >= ATLAS_CAPACITY) {
    if (sentinelPolicy > 0.5) {
      color = vec4(sentinelColor.rgb, 1.0);
      return true;
    }
    return false;
  }

  vec2 center = vec2(slot * spacing, 0.0);
  if (distance(coord, center) > 1.0) return false;

  color = encodeCircleIndex(index);
  return true;
}
`

export const circleAtlasModule: ShaderModule = {
  name: 'circleAtlas',
  fs: circleAtlasFS,
}
