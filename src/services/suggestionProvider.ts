// src/services/suggestionProvider.ts

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { Doctor } from '../models/Doctor';
import { Logger } from '../logger';
import { HospitalStore } from '../store/hospitalStore';

export type Relevance = 'high' | 'medium' | 'low';

export interface DoctorSuggestion {
    doctorId: string;
    name: string;
    specialization: string;
    matchReason: string;
    relevance: Relevance;
}

export interface Suggestion {
    summary: string;
    specializations: string[];
    doctors: DoctorSuggestion[];
}

/**
 * Triage collaborator: ranks specializations and doctors for a visit reason.
 * Only used to pre-fill staff choices; scheduling never depends on it.
 */
export interface SuggestionProvider {
    suggest(reason: string, limit: number): Suggestion;
}

const KeywordTableSchema = z.object({
    fallback: z.string().min(1),
    specializations: z.record(z.array(z.string().min(1)))
});

export type KeywordTable = z.infer<typeof KeywordTableSchema>;

export const DEFAULT_KEYWORD_FILE = path.join(__dirname, '..', '..', 'data', 'specialization-keywords.json');

export function loadKeywordTable(filePath: string = DEFAULT_KEYWORD_FILE): KeywordTable {
    const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    return KeywordTableSchema.parse(raw);
}

/**
 * Keyword ranking
 *
 * Every keyword found in the reason adds its length to its specialization's
 * score, so longer (more specific) phrases weigh more.
 */
export class KeywordSuggestionProvider implements SuggestionProvider {
    private readonly store: HospitalStore;
    private readonly table: KeywordTable;

    constructor(store: HospitalStore, table: KeywordTable) {
        this.store = store;
        this.table = table;
    }

    rankSpecializations(reason: string): string[] {
        const text = reason.trim().toLowerCase();
        if (!text) {
            return [this.table.fallback];
        }

        const scores = new Map<string, number>();
        for (const [specialization, keywords] of Object.entries(this.table.specializations)) {
            for (const keyword of keywords) {
                if (text.includes(keyword.toLowerCase())) {
                    scores.set(specialization, (scores.get(specialization) ?? 0) + keyword.length);
                }
            }
        }

        if (scores.size === 0) {
            return [this.table.fallback];
        }

        return [...scores.entries()]
            .sort((a, b) => b[1] - a[1])
            .map(([specialization]) => specialization);
    }

    suggest(reason: string, limit: number): Suggestion {
        const specializations = this.rankSpecializations(reason);
        return {
            summary: this.summarize(reason, specializations),
            specializations,
            doctors: this.matchDoctors(specializations, limit)
        };
    }

    private summarize(reason: string, specializations: string[]): string {
        if (reason.trim() && specializations.length === 1 && specializations[0] === this.table.fallback) {
            return 'General consultation recommended';
        }
        if (specializations.length === 1) {
            return `Suggested specialty: ${specializations[0]}`;
        }
        return `Suggested specialties: ${specializations.slice(0, 3).join(', ')}`;
    }

    private matchDoctors(specializations: string[], limit: number): DoctorSuggestion[] {
        const doctors = this.store.listDoctors();
        const seen = new Set<string>();
        const suggestions: DoctorSuggestion[] = [];

        const add = (doctor: Doctor, matchReason: string, relevance: Relevance): void => {
            if (seen.has(doctor.id)) {
                return;
            }
            seen.add(doctor.id);
            suggestions.push({
                doctorId: doctor.id,
                name: doctor.name,
                specialization: doctor.specialization,
                matchReason,
                relevance
            });
        };

        specializations.forEach((specialization, rank) => {
            const needle = specialization.toLowerCase();
            for (const doctor of doctors) {
                if (doctor.specialization.toLowerCase().includes(needle)) {
                    add(doctor, `Specializes in ${doctor.specialization}`, rank === 0 ? 'high' : 'medium');
                }
            }
        });

        if (suggestions.length === 0) {
            for (const doctor of doctors) {
                if (doctor.specialization.toLowerCase().includes('general')) {
                    add(doctor, 'General practitioner', 'low');
                }
            }
        }

        if (suggestions.length === 0) {
            for (const doctor of doctors.slice(0, limit)) {
                add(doctor, 'Available doctor', 'low');
            }
        }

        return suggestions.slice(0, limit);
    }
}

/**
 * Ask the provider, falling back to an empty suggestion if it throws
 */
export function suggestSafely(provider: SuggestionProvider, logger: Logger, reason: string, limit: number): Suggestion {
    try {
        return provider.suggest(reason, limit);
    } catch (err) {
        logger.warn({ err }, 'suggestion provider failed');
        return { summary: 'No suggestions available', specializations: [], doctors: [] };
    }
}
