import { Inject, Injectable } from "@nestjs/common";
import { PRICE_STORE, type PriceStore, runInSession } from "../price-store/price-store";
import type { GrindingProvider } from "../price-store/price-store.types";
import type { AvailabilitySelector } from "./availability";
import { AvailabilityMatrix } from "./availability-matrix";

@Injectable()
export class AvailabilityService {
  constructor(@Inject(PRICE_STORE) private readonly priceStore: PriceStore) {}

  isAvailable(selector: AvailabilitySelector) {
    return runInSession(this.priceStore, (session) =>
      new AvailabilityMatrix(session).isAvailable(selector)
    );
  }

  checkGrindingAvailability(
    provider: GrindingProvider,
    thickness: number,
    width: number,
    grit: string | null,
    withSb: boolean
  ) {
    return runInSession(this.priceStore, (session) =>
      new AvailabilityMatrix(session).checkGrindingAvailability(provider, thickness, width, grit, withSb)
    );
  }

  listAvailable(thickness: number, width: number, grit?: string) {
    return runInSession(this.priceStore, (session) =>
      new AvailabilityMatrix(session).listAvailable(thickness, width, grit)
    );
  }

  getGrindingMatrix(provider: GrindingProvider, widthVariant?: string) {
    return runInSession(this.priceStore, (session) =>
      new AvailabilityMatrix(session).getGrindingMatrix(provider, widthVariant)
    );
  }

  getFilmMatrix() {
    return runInSession(this.priceStore, (session) => new AvailabilityMatrix(session).getFilmMatrix());
  }
}
