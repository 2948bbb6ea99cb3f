/**
 * Rule Model
 *
 * A first-order implication over relations. A numeric weight makes it a
 * soft rule; a null weight makes it hard (fixed).
 */

import { createInvalidProblemError } from '../types/errors.js';

export class Rule {
    private readonly _text: string;
    private _weight: number | null;

    constructor(text: string, weight: number | null = null) {
        if (text.trim() === '') {
            throw createInvalidProblemError('Rule text must not be empty');
        }
        this._text = text;
        this._weight = null;
        this.setWeight(weight);
    }

    text(): string {
        return this._text;
    }

    weight(): number | null {
        return this._weight;
    }

    isWeighted(): boolean {
        return this._weight !== null;
    }

    setWeight(weight: number | null): void {
        if (weight !== null && !Number.isFinite(weight)) {
            throw createInvalidProblemError(`Rule weight must be finite, got ${weight}`, this._text);
        }
        this._weight = weight;
    }

    toString(): string {
        return this.isWeighted() ? `${this._weight}: ${this._text}` : `${this._text} .`;
    }
}
