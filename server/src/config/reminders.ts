import { readFileSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const remindersSchema = z.array(z.string().min(1)).min(1);

let cached: string[] | null = null;

export function getIntegrityReminders(): string[] {
    if (!cached) {
        const remindersPath = path.join(__dirname, 'integrity-reminders.json');
        cached = remindersSchema.parse(JSON.parse(readFileSync(remindersPath, 'utf-8')));
    }
    return cached;
}

export function pickIntegrityReminder(random: () => number = Math.random): string {
    const reminders = getIntegrityReminders();
    return reminders[Math.floor(random() * reminders.length)] ?? reminders[0];
}
