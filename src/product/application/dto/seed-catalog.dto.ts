/**
 * 애플리케이션 레이어 DTO: SeedCatalog 요청
 * source는 외부 문서이므로 형태를 신뢰하지 않는다.
 */
export class SeedCatalogCommand {
  constructor(public readonly source: unknown) {}
}

/**
 * 애플리케이션 레이어 DTO: SeedCatalog 결과
 */
export class SeedCatalogResult {
  constructor(
    public readonly committed: boolean,
    public readonly upserted: number,
    public readonly skipped: number,
  ) {}
}
