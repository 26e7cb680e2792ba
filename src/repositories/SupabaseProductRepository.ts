/**
 * Supabase Product Repository 구현
 *
 * SOLID 원칙:
 * - SRP: Supabase와의 데이터 통신만 담당
 * - DIP: IProductRepository 인터페이스 구현
 *
 * Design Pattern:
 * - Repository Pattern: 데이터 접근 로직 캡슐화
 *
 * 필요한 DB 객체는 db/schema.sql 참고
 */

import { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { IProductRepository } from "@/core/interfaces/IProductRepository";
import { Product } from "@/core/domain/Product";
import { SearchCriteria } from "@/core/domain/SearchCriteria";
import { ProductMapper } from "@/mappers/ProductMapper";
import { DATABASE_CONFIG, REPOSITORY_CONFIG } from "@/config/constants";
import { logger } from "@/config/logger";
import { getSupabaseClient } from "@/repositories/SupabaseClientFactory";

const RpcNumberSchema = z.coerce.number().int();

export class SupabaseProductRepository implements IProductRepository {
  private readonly client: SupabaseClient;
  private readonly tableName = DATABASE_CONFIG.PRODUCT_TABLE_NAME;
  private readonly fields = REPOSITORY_CONFIG.DEFAULT_PRODUCT_FIELDS.join(", ");

  constructor(client?: SupabaseClient) {
    this.client = client ?? getSupabaseClient();
  }

  async findByIdent(ident: string): Promise<Product | null> {
    const { data, error } = await this.client
      .from(this.tableName)
      .select(this.fields)
      .eq("ident", ident)
      .maybeSingle();

    if (error) {
      logger.error(
        { error: error.message, code: error.code, ident },
        "[ProductRepository] 상품 조회 실패",
      );
      throw new Error(`Supabase query failed: ${error.message}`);
    }

    return data ? ProductMapper.toDomain(data) : null;
  }

  async findByIdents(idents: string[]): Promise<Product[]> {
    if (idents.length === 0) {
      return [];
    }

    const { data, error } = await this.client
      .from(this.tableName)
      .select(this.fields)
      .in("ident", idents);

    if (error) {
      logger.error(
        { error: error.message, code: error.code, count: idents.length },
        "[ProductRepository] 상품 다건 조회 실패",
      );
      throw new Error(`Supabase query failed: ${error.message}`);
    }

    return (data ?? []).map((row) => ProductMapper.toDomain(row));
  }

  async save(product: Product): Promise<Product> {
    const { data, error } = await this.client
      .from(this.tableName)
      .upsert(ProductMapper.toRow(product), { onConflict: "ident" })
      .select(this.fields)
      .single();

    if (error) {
      logger.error(
        { error: error.message, code: error.code, ident: product.ident },
        "[ProductRepository] 상품 저장 실패",
      );
      throw new Error(`Supabase upsert failed: ${error.message}`);
    }

    logger.debug({ ident: product.ident }, "[ProductRepository] 상품 저장");

    return ProductMapper.toDomain(data);
  }

  async delete(ident: string): Promise<void> {
    const { error } = await this.client
      .from(this.tableName)
      .delete()
      .eq("ident", ident);

    if (error) {
      logger.error(
        { error: error.message, code: error.code, ident },
        "[ProductRepository] 상품 삭제 실패",
      );
      throw new Error(`Supabase delete failed: ${error.message}`);
    }
  }

  async nextSeriesId(): Promise<number> {
    const { data, error } = await this.client.rpc(
      DATABASE_CONFIG.NEXT_SERIES_ID_RPC,
    );

    if (error) {
      logger.error(
        { error: error.message, code: error.code },
        "[ProductRepository] 계약번호 시퀀스 조회 실패",
      );
      throw new Error(`Supabase rpc failed: ${error.message}`);
    }

    return RpcNumberSchema.parse(data);
  }

  async terminateExpiredProducts(): Promise<number> {
    const { data, error } = await this.client.rpc(
      DATABASE_CONFIG.TERMINATE_EXPIRED_RPC,
    );

    if (error) {
      logger.error(
        { error: error.message, code: error.code },
        "[ProductRepository] 만료 상품 종료 실패",
      );
      throw new Error(`Supabase rpc failed: ${error.message}`);
    }

    return RpcNumberSchema.parse(data ?? 0);
  }

  async findBySearchCriteria(criteria: SearchCriteria): Promise<Product[]> {
    let query = this.client.from(this.tableName).select(this.fields);

    if (criteria.status) {
      query = query.eq("status", criteria.status);
    }
    if (criteria.baseType) {
      query = query.eq("base_type", criteria.baseType);
    }
    if (criteria.contractNumber) {
      query = query.eq("contract_number", criteria.contractNumber);
    }
    if (criteria.name) {
      query = query.ilike("name", `%${criteria.name}%`);
    }
    if (criteria.startDateFrom) {
      query = query.gte("start_date", criteria.startDateFrom.toISOString());
    }
    if (criteria.startDateTo) {
      query = query.lte("start_date", criteria.startDateTo.toISOString());
    }

    const { data, error } = await query
      .order("ident")
      .limit(criteria.limit ?? REPOSITORY_CONFIG.MAX_SEARCH_LIMIT);

    if (error) {
      logger.error(
        { error: error.message, code: error.code, criteria },
        "[ProductRepository] 상품 검색 실패",
      );
      throw new Error(`Supabase query failed: ${error.message}`);
    }

    logger.info(
      { count: data?.length ?? 0 },
      "[ProductRepository] 상품 검색 완료",
    );

    return (data ?? []).map((row) => ProductMapper.toDomain(row));
  }
}
