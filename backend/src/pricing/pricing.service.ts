import { Inject, Injectable, Logger } from "@nestjs/common";
import { AvailabilityMatrix } from "../availability/availability-matrix";
import { isBlockedPrice } from "../availability/availability";
import { BasePriceNotFoundError, MaterialNotFoundError } from "../common/errors";
import { roundTo } from "../common/numbers";
import { APP_CONFIG, type AppConfig } from "../config/app-config";
import {
  PRICE_STORE,
  type PriceStore,
  type PriceStoreSession,
  runInSession,
} from "../price-store/price-store";
import { supersedes } from "../price-store/price-store.queries";
import type { Material } from "../price-store/price-store.types";
import { evaluateProcessingOption } from "./processing-gate";
import type {
  AvailableOptions,
  PriceBreakdown,
  PriceRequest,
  PriceTableFilters,
  PriceTableRow,
  SurchargeLine,
  UnappliedModifier,
} from "./pricing.types";
import { sheetAreaM2, sheetWeightKg } from "./sheet-geometry";

const NOT_REQUESTED: SurchargeLine = { status: "not_requested", cost: 0 };

@Injectable()
export class PricingService {
  private readonly logger = new Logger(PricingService.name);

  constructor(
    @Inject(PRICE_STORE) private readonly priceStore: PriceStore,
    @Inject(APP_CONFIG) private readonly config: AppConfig
  ) {}

  computePrice(request: PriceRequest) {
    return runInSession(this.priceStore, (session) => this.computeInSession(session, request));
  }

  getAvailableOptions(materialId: string, surfaceFinish: string, thickness: number) {
    return runInSession(this.priceStore, async (session): Promise<AvailableOptions> => {
      const material = await this.requireMaterial(session, materialId);
      const option = await session.findProcessingOption(material.grade, surfaceFinish);
      const gate = evaluateProcessingOption(option, thickness, 1000, false);

      const [films, grindings] = await Promise.all([
        session.listFilmPrices({ activeOnly: true, thickness }),
        session.listGrindingPrices({ activeOnly: true, thickness }),
      ]);

      return {
        processingAllowed: gate.allowed,
        notes: gate.note,
        films: films
          .filter((film) => !isBlockedPrice(film.pricePlnPerKg))
          .map((film) => ({ type: film.filmType, pricePlnPerKg: film.pricePlnPerKg })),
        grindings: grindings
          .filter((grinding) => !isBlockedPrice(grinding.pricePlnPerKg))
          .map((grinding) => ({
            provider: grinding.provider,
            grit: grinding.grit,
            widthVariant: grinding.widthVariant,
            withSb: grinding.withSb,
            pricePlnPerKg: grinding.pricePlnPerKg,
          })),
      };
    });
  }

  getPriceTable(filters: PriceTableFilters) {
    return runInSession(this.priceStore, async (session): Promise<PriceTableRow[]> => {
      const rate = await this.resolveExchangeRate(session);
      const rows = await session.listBasePrices({
        activeOnly: true,
        categories: filters.category ? [filters.category] : undefined,
        grades: filters.grade ? [filters.grade] : undefined,
        surfaceFinishes: filters.surfaceFinish ? [filters.surfaceFinish] : undefined,
        thicknessMin: filters.thicknessMin,
        thicknessMax: filters.thicknessMax,
        widths: filters.width !== undefined ? [filters.width] : undefined,
      });

      return rows.map((row) => ({
        id: row.id,
        materialId: row.materialId,
        materialName: row.material.name,
        grade: row.material.grade,
        category: row.material.category,
        surfaceFinish: row.surfaceFinish,
        thickness: row.thickness,
        width: row.width,
        length: row.length,
        pricePlnPerKg: row.pricePlnPerKg,
        priceEurPerKg: roundTo(row.pricePlnPerKg / rate, 4),
        notes: row.notes,
      }));
    });
  }

  private async computeInSession(
    session: PriceStoreSession,
    request: PriceRequest
  ): Promise<PriceBreakdown> {
    const { surfaceFinish, thickness, width, length } = request;
    const material = await this.requireMaterial(session, request.materialId);

    const weightKg = sheetWeightKg(material.density, thickness, width, length);
    const areaM2 = sheetAreaM2(width, length);

    const candidates = await session.listBasePrices({
      activeOnly: true,
      materialIds: [material.id],
      surfaceFinishes: [surfaceFinish],
      thicknessMin: thickness,
      thicknessMax: thickness,
      widths: [width],
    });
    const basePrice = candidates.reduce<(typeof candidates)[number] | null>(
      (latest, row) => (latest === null || supersedes(row, latest) ? row : latest),
      null
    );
    if (!basePrice) {
      throw new BasePriceNotFoundError(material.grade, surfaceFinish, thickness, width);
    }

    const exchangeRate = await this.resolveExchangeRate(session);
    const matrix = new AvailabilityMatrix(session);
    let notes = basePrice.notes;
    let film: SurchargeLine = NOT_REQUESTED;
    let grinding: SurchargeLine = NOT_REQUESTED;

    const grindingSelector = request.grinding
      ? {
          ...matrix.resolveGrindingSelector(
            request.grinding.provider,
            thickness,
            width,
            request.grinding.grit ?? null,
            request.grinding.withSb ?? false
          ),
          ...(request.grinding.provider === "BORYS" && request.grinding.widthVariant
            ? { widthVariant: request.grinding.widthVariant }
            : {}),
        }
      : null;

    let blockedByGate = false;
    if (grindingSelector) {
      const option = await session.findProcessingOption(material.grade, surfaceFinish);
      const gate = evaluateProcessingOption(option, thickness, width, true);
      if (!gate.allowed) {
        blockedByGate = true;
        notes = gate.note;
        grinding = { status: "blocked", cost: 0, note: gate.note };
        if (request.filmType) {
          film = { status: "blocked", cost: 0, note: gate.note };
        }
      }
    }

    if (!blockedByGate) {
      if (request.filmType) {
        const availability = await matrix.isFilmAvailable({ filmType: request.filmType, thickness });
        film = availability.available
          ? { status: "applied", cost: availability.price }
          : { status: "unavailable", cost: 0, reason: availability.reason };
      }

      if (grindingSelector) {
        const availability = await matrix.isGrindingAvailable(grindingSelector);
        grinding = availability.available
          ? { status: "applied", cost: availability.price }
          : { status: "unavailable", cost: 0, reason: availability.reason };
      }
    }

    if (film.status === "unavailable" || grinding.status === "unavailable") {
      this.logger.debug(
        `price ${material.grade} ${surfaceFinish} ${thickness}x${width}: film=${film.status} grinding=${grinding.status}`
      );
    }

    const totalPln = basePrice.pricePlnPerKg + film.cost + grinding.cost;
    const totalEur = totalPln / exchangeRate;
    const sheetPricePln = totalPln * weightKg;

    return {
      basePricePlnPerKg: roundTo(basePrice.pricePlnPerKg, 4),
      filmCostPlnPerKg: roundTo(film.cost, 4),
      grindingCostPlnPerKg: roundTo(grinding.cost, 4),
      totalPricePlnPerKg: roundTo(totalPln, 4),
      totalPriceEurPerKg: roundTo(totalEur, 4),
      exchangeRate,
      sheetPricePln: roundTo(sheetPricePln, 2),
      sheetPriceEur: roundTo(sheetPricePln / exchangeRate, 2),
      pricePerM2Pln: areaM2 > 0 ? roundTo(sheetPricePln / areaM2, 2) : 0,
      dimensions: { thicknessMm: thickness, widthMm: width, lengthMm: length },
      weightKg: roundTo(weightKg, 3),
      areaM2: roundTo(areaM2, 4),
      configuration: {
        material: material.grade,
        surface: surfaceFinish,
        film: film.status === "applied" && request.filmType ? request.filmType : null,
        grinding: grinding.status === "applied" && grindingSelector ? grindingSelector.provider : null,
        grit: grinding.status === "applied" && grindingSelector ? grindingSelector.grit : null,
        widthVariant:
          grinding.status === "applied" && grindingSelector ? grindingSelector.widthVariant : null,
        withSb: grinding.status === "applied" && grindingSelector ? grindingSelector.withSb : false,
      },
      film,
      grinding,
      unappliedModifiers: await this.findUnappliedModifiers(
        session,
        material,
        surfaceFinish,
        thickness,
        width
      ),
      notes,
    };
  }

  private async requireMaterial(session: PriceStoreSession, materialId: string) {
    const material = await session.findMaterialById(materialId);
    if (!material) {
      throw new MaterialNotFoundError(materialId);
    }

    return material;
  }

  private async resolveExchangeRate(session: PriceStoreSession) {
    const rate = await session.findLatestExchangeRate("EUR", "PLN");
    return rate && rate.rate > 0 ? rate.rate : this.config.defaultExchangeRate;
  }

  /**
   * Surcharges stored for this geometry. They are reported next to the
   * breakdown and never added to the total.
   */
  private async findUnappliedModifiers(
    session: PriceStoreSession,
    material: Material,
    surfaceFinish: string,
    thickness: number,
    width: number
  ) {
    const [thicknessModifiers, widthModifiers] = await Promise.all([
      session.listThicknessModifiers(),
      session.listWidthModifiers(),
    ]);

    const modifiers: UnappliedModifier[] = [];
    for (const modifier of thicknessModifiers) {
      if (
        modifier.grade === material.grade &&
        modifier.surfaceFinish === surfaceFinish &&
        modifier.thickness === thickness
      ) {
        modifiers.push({
          kind: "thickness",
          id: modifier.id,
          baseWidth: modifier.baseWidth,
          priceModifier: modifier.priceModifier,
        });
      }
    }
    for (const modifier of widthModifiers) {
      if ((modifier.grade === null || modifier.grade === material.grade) && modifier.width === width) {
        modifiers.push({
          kind: "width",
          id: modifier.id,
          grade: modifier.grade,
          priceModifier: modifier.priceModifier,
        });
      }
    }

    return modifiers;
  }
}
