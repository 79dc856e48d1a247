export { createProductModule, type ProductModule } from './product.module';
export { ProductService } from './product.service';
export { ProductErrors } from './product.errors';
export { PRODUCT_MANAGER_ROLES, canManageProducts } from './policies/product-access.policy';
export { normalizePrice } from './policies/price.policy';
export { pickUniqueSlug, slugifyProductName } from './policies/product-slug.policy';
export type {
  Page,
  Product,
  ProductDetail,
  ProductImage,
  ProductListItem,
  ProductStatus,
} from './product.types';
