/**
 * Reversal Classifier
 * Decides whether a resolved market is a black swan: an early sample implied
 * a confident favorite, the other side won, and the favorite's last known
 * probability fell below the final-certainty threshold.
 */

import type {
    ClassificationResult,
    Market,
    ProbabilitySample,
    ReversalWindowSpec,
    Side,
} from './types.js';
import { noSideThreshold, roundProbability } from './window-spec.js';

interface Reading {
    timestamp: Date;
    probability: number; // of "Yes"
}

/**
 * Favorite implied by an early probability of "Yes", or null when neither
 * side clears the early-certainty threshold
 */
export function impliedFavorite(probabilityYes: number, spec: ReversalWindowSpec): Side | null {
    const p = roundProbability(probabilityYes);
    if (p >= spec.earlyCertaintyThreshold) return 'YES';
    if (p <= noSideThreshold(spec)) return 'NO';
    return null;
}

function probabilityOf(side: Side, probabilityYes: number): number {
    return roundProbability(side === 'YES' ? probabilityYes : 1 - probabilityYes);
}

/**
 * Classify a market from its samples at the configured offsets.
 * Returns null when the market is excluded: below the volume floor,
 * unresolved, or without any sample.
 */
export function classifyReversal(
    market: Market,
    samples: readonly ProbabilitySample[],
    spec: ReversalWindowSpec
): ClassificationResult | null {
    if (market.volume < spec.minVolume) return null;
    if (market.outcome === null) return null;

    const readings: Reading[] = samples
        .filter(s => s.marketId === market.id)
        .map(s => ({ timestamp: s.timestamp, probability: roundProbability(s.probability) }))
        .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());

    if (readings.length === 0) return null;

    const winningSide = market.outcome;
    const early = readings[0];
    // With a single reading the resolution itself is the final reading
    const final: Reading = readings.length > 1
        ? readings[readings.length - 1]
        : { timestamp: market.resolvedAt, probability: winningSide === 'YES' ? 1 : 0 };

    const favorite = impliedFavorite(early.probability, spec);

    if (favorite === null) {
        return {
            marketId: market.id,
            question: market.question,
            isBlackSwan: false,
            favorite: null,
            winningSide,
            earlyProbability: early.probability,
            earlyTimestamp: early.timestamp,
            finalProbability: final.probability,
            finalTimestamp: final.timestamp,
            magnitude: roundProbability(Math.abs(early.probability - final.probability)),
            volume: market.volume,
        };
    }

    const earlyProbability = probabilityOf(favorite, early.probability);
    const finalProbability = probabilityOf(favorite, final.probability);
    const favoriteLost = favorite !== winningSide;
    const isBlackSwan = favoriteLost && finalProbability < spec.finalCertaintyThreshold;

    return {
        marketId: market.id,
        question: market.question,
        isBlackSwan,
        favorite,
        winningSide,
        earlyProbability,
        earlyTimestamp: early.timestamp,
        finalProbability,
        finalTimestamp: final.timestamp,
        magnitude: roundProbability(Math.abs(earlyProbability - finalProbability)),
        volume: market.volume,
    };
}
