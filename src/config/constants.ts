/**
 * 애플리케이션 설정 상수
 *
 * 환경변수 기반 설정 관리
 * - 환경변수가 없으면 기본값 사용
 * - 타입 안전성 보장
 */

/**
 * 애플리케이션 메타데이터
 *
 * ⚠️ package.json의 version 필드와 수동 동기화 필요
 */
export const APP_METADATA = {
  VERSION: "1.0.0",
  NAME: "Product Inventory",
} as const;

/**
 * 서비스 이름 (로그 파일 라우팅용)
 */
export const SERVICE_NAMES = {
  SERVER: "server",
  SCHEDULER: "scheduler",
} as const;

/**
 * 상품 도메인 상수
 */
export const PRODUCT_CONSTANTS = {
  /** 루트 상품 baseType / 루트 관계 타입 */
  ROOT: "root",

  /** 번들(하위) 관계 타입 */
  BUNDLED: "bundled",

  /** 계약번호 접두사 (예: GKP0000001) */
  CONTRACT_NUMBER_PREFIX: "GKP",

  /** 계약번호 시퀀스 자릿수 */
  CONTRACT_NUMBER_DIGITS: 7,

  /** 일회성 요금 */
  PRICE_TYPE_OTC: "OTC",

  /** 월 정기 요금 */
  PRICE_TYPE_MRC: "MRC",
} as const;

/**
 * href 설정
 * 최종 형식: <HREF_BASE_PATH><HREF_PRODUCT_PATH>/<ident>
 */
export const HREF_CONFIG = {
  /**
   * 환경변수: HREF_BASE_PATH
   * 기본값: "http://localhost:3000"
   */
  BASE_PATH: process.env.HREF_BASE_PATH || "http://localhost:3000",

  /**
   * 환경변수: HREF_PRODUCT_PATH
   * 기본값: "/api/v2/products"
   */
  PRODUCT_PATH: process.env.HREF_PRODUCT_PATH || "/api/v2/products",
} as const;

/**
 * 데이터베이스 설정
 */
export const DATABASE_CONFIG = {
  /**
   * Products 테이블명
   * 환경변수: PRODUCT_TABLE_NAME
   * 기본값: "products"
   */
  PRODUCT_TABLE_NAME: process.env.PRODUCT_TABLE_NAME || "products",

  /** 계약번호 시퀀스 RPC */
  NEXT_SERIES_ID_RPC: "next_contract_series_id",

  /** 만료 상품 일괄 종료 RPC */
  TERMINATE_EXPIRED_RPC: "terminate_expired_products",
} as const;

/**
 * Repository 설정
 */
export const REPOSITORY_CONFIG = {
  DEFAULT_PRODUCT_FIELDS: [
    "ident",
    "href",
    "name",
    "description",
    "status",
    "base_type",
    "contract_number",
    "product_relationships",
    "product_prices",
    "start_date",
    "termination_date",
  ],

  /**
   * 검색 결과 최대 개수
   * 환경변수: MAX_SEARCH_LIMIT
   * 기본값: 1000
   */
  MAX_SEARCH_LIMIT: Number(process.env.MAX_SEARCH_LIMIT) || 1000,
} as const;

/**
 * CSV Export 설정
 */
export const CSV_CONFIG = {
  DELIMITER: ",",
  HEADERS: [
    "Product name",
    "Contract number",
    "One time charge",
    "Monthly recurring charge",
    "Start date",
    "Duration",
  ],
  FILE_NAME: "products.csv",
} as const;

/**
 * 스케줄러 설정
 */
export const SCHEDULER_CONFIG = {
  /**
   * 만료 상품 종료 Cron 표현식
   * 환경변수: TERMINATE_EXPIRED_CRON
   * 기본값: 매일 03:00
   */
  TERMINATE_EXPIRED_CRON: process.env.TERMINATE_EXPIRED_CRON || "0 3 * * *",

  /**
   * 환경변수: SCHEDULER_TIMEZONE
   * 기본값: "Europe/Berlin"
   */
  TIMEZONE: process.env.SCHEDULER_TIMEZONE || "Europe/Berlin",
} as const;
