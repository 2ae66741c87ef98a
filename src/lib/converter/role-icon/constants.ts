import type { VariantName, VariantSpec } from './schemas';
import { VariantSpecSchema } from './schemas';

// The tab icon is saved straight from the compositor, never placed on a canvas
export const TAB_SPEC: Readonly<VariantSpec> = VariantSpecSchema.parse({
  name: 'tab',
  defaultSize: 16,
  blurRadius: 0,
  shadowOffset: 0,
  margin: 0,
  template: 'none',
});

export const VARIANT_SPECS: readonly Readonly<VariantSpec>[] = [
  {
    name: 'score',
    defaultSize: 64,
    blurRadius: 0,
    shadowOffset: 0,
    margin: 0,
    template: 'ignore',
  },
  {
    name: 'sprite',
    defaultSize: 256,
    blurRadius: 3,
    shadowOffset: 2,
    margin: 3,
    template: 'sprite_template.png',
  },
  {
    name: 'icon',
    defaultSize: 256,
    blurRadius: 5,
    shadowOffset: 4,
    margin: 10,
    template: 'icon_template.png',
  },
].map((spec) => VariantSpecSchema.parse(spec));

// Variants that are handed to VTFCmd after the PNG set is written
export const VTF_VARIANTS: readonly VariantName[] = ['sprite', 'icon'];

export function getVariantFileBase(variant: VariantName, namespace: string): string {
  return `${variant}_${namespace}`;
}
