export { generateRoleAssets, getRoleOutputDir } from './role-assets';
export type { RoleAssetsOptions, RoleAssetsResult } from './role-assets';

export { createPngSet, resolveCanvas } from './png-set-builder';
export { buildShadow, makeLayer } from './layer-compositor';

export type {
  PngSetEntry,
  PngSetResult,
  VariantName,
  VariantSpec,
} from './schemas';
export { VariantNameSchema, VariantSpecSchema } from './schemas';

export {
  getVariantFileBase,
  TAB_SPEC,
  VARIANT_SPECS,
  VTF_VARIANTS,
} from './constants';
