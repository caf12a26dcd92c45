// worldcore/trade/TradeHandle.ts

import type { Failure, Ok } from "../shared/Status";
import { fail, ok } from "../shared/Status";
import { Logger } from "../utils/logger";
import type { TradeRegistry } from "./TradeRegistry";
import {
  TradeOffer,
  TradeSession,
  TradeSide,
  TradeSideName,
  TradeState,
  isClosed,
  otherSide,
  toOffer,
} from "./TradeTypes";

const log = Logger.scope("TRADE");

export type OfferResult = Ok<{ offer: TradeOffer }> | Failure<"invalidArgument">;
export type AcceptResult = Ok<{ state: TradeState }> | Failure<"invalidArgument">;

const EMPTY_OFFER: TradeOffer = { offeredItems: [], accepted: false };

/**
 * Facade over one side of a registered trade. Holds only (tradeId, side);
 * all reads and writes go through the registry region.
 */
export class TradeHandle {
  constructor(
    private readonly registry: TradeRegistry,
    readonly tradeId: number,
    readonly side: TradeSideName,
  ) {}

  /** Replace this side's offered slots. */
  offerItems(slots: number[]): OfferResult {
    return this.changeOffer(() => [...slots]);
  }

  /** Drop the given slots from this side's offer. */
  removeItems(slots: number[]): OfferResult {
    return this.changeOffer((current) => current.filter((s) => !slots.includes(s)));
  }

  /**
   * Marks this side accepted. The trade only moves to "accepted" once the
   * other side has already accepted.
   */
  accept(): AcceptResult {
    const result = this.withSession((session): AcceptResult => {
      if (isClosed(session.state)) return fail("invalidArgument");

      session[this.side].accepted = true;
      if (session[otherSide(this.side)].accepted) {
        session.state = "accepted";
      }
      return ok({ state: session.state });
    });

    if (!result) return fail("invalidArgument");
    if (result.status === "ok" && result.state === "accepted") {
      log.info("Trade accepted by both sides", { tradeId: this.tradeId });
    }
    return result;
  }

  /** Unconditional; does not require a prior mutual accept. */
  confirm(): Ok<{ state: TradeState }> {
    this.withSession((session) => {
      session.state = "confirmed";
    });
    log.info("Trade confirmed", { tradeId: this.tradeId, side: this.side });
    return ok({ state: "confirmed" });
  }

  cancel(): Ok<{ state: TradeState }> {
    this.withSession((session) => {
      session.state = "cancelled";
    });
    log.info("Trade cancelled", { tradeId: this.tradeId, side: this.side });
    return ok({ state: "cancelled" });
  }

  viewOtherOffer(): { offer: TradeOffer } {
    const offer = this.withSession((session) => toOffer(session[otherSide(this.side)]));
    return { offer: offer ?? EMPTY_OFFER };
  }

  getState(): { state: TradeState } {
    const state = this.withSession((session) => session.state);
    return { state: state ?? "cancelled" };
  }

  private changeOffer(next: (current: number[]) => number[]): OfferResult {
    const result = this.withSession((session): OfferResult => {
      if (isClosed(session.state)) return fail("invalidArgument");

      const mine: TradeSide = session[this.side];
      mine.offeredSlots = next(mine.offeredSlots);

      // Any change to the terms voids both acceptances.
      session.initiator.accepted = false;
      session.target.accepted = false;
      if (session.state === "accepted") {
        session.state = "proposing";
      }
      return ok({ offer: toOffer(mine) });
    });

    return result ?? fail("invalidArgument");
  }

  private withSession<R>(fn: (session: TradeSession) => R): R | undefined {
    return this.registry.region.run((s) => {
      const session = s.sessions.get(this.tradeId);
      return session ? fn(session) : undefined;
    });
  }
}
