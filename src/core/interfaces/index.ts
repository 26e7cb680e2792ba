/**
 * Core Interfaces Barrel Export
 */

export type { IProductRepository } from "./IProductRepository";
export type { IProductRelationshipRepository } from "./IProductRelationshipRepository";
export {
  ProductErrorType,
  ProductError,
  ProductNotFoundError,
  ProductsNotFoundError,
  InvalidProductInitialStatusError,
  InvalidProductDeleteStatusError,
  InvalidStatusTransitionError,
  CyclicRelationshipDetectedError,
} from "./ProductErrorType";
