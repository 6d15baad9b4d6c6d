import { Candidate } from "../types";

const escapeCell = (value: string | number) => {
    const text = String(value);
    return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
};

export function toCsv(rows: (string | number)[][]): string {
    return rows.map((row) => row.map(escapeCell).join(",")).join("\r\n") + "\r\n";
}

export function resultsCsv(candidates: Candidate[]): string {
    return toCsv([["Candidate", "Votes"], ...candidates.map((c) => [c.name, c.votes])]);
}

export const resultsFilename = (surveyId: number) => `survey_${surveyId}_results.csv`;
