/**
 * RichFormatter - Human-centric output formatting for expedition tools
 * Provides consistent markdown formatting while preserving JSON for frontends.
 */

import type { ExpeditionPacket, PacketEntity, PacketMage } from '../../schema/expedition.js';
import type { ExpeditionCatalog } from '../../engine/expedition/catalog.js';
import type { StoryInputs } from '../../engine/expedition/packet-tools.js';
import type { CollisionViolation } from '../../engine/expedition/validator.js';

export class RichFormatter {
    // ============================================================
    // HEADERS & SECTIONS
    // ============================================================

    static header(title: string, icon: string = '🧭'): string {
        const line = '━'.repeat(40);
        return `\n${line}\n${icon}  **${title.toUpperCase()}**\n${line}\n`;
    }

    static section(title: string): string {
        return `\n### ${title}\n`;
    }

    // ============================================================
    // DATA FORMATTING
    // ============================================================

    static keyValue(data: Record<string, unknown>): string {
        let output = '';
        for (const [key, value] of Object.entries(data)) {
            if (value === undefined || value === null) continue;
            const displayValue = typeof value === 'object' ? JSON.stringify(value) : String(value);
            output += `- **${key}:** ${displayValue}\n`;
        }
        return output;
    }

    static table(headers: string[], rows: (string | number)[][]): string {
        if (rows.length === 0) {
            return '\n*No data*\n';
        }
        const headerRow = `| ${headers.join(' | ')} |`;
        const separatorRow = `| ${headers.map(() => '---').join(' | ')} |`;
        const dataRows = rows.map(row => `| ${row.join(' | ')} |`).join('\n');
        return `\n${headerRow}\n${separatorRow}\n${dataRows}\n`;
    }

    static list(items: string[], ordered: boolean = false): string {
        if (items.length === 0) return '\n*None*\n';
        return '\n' + items.map((item, i) => ordered ? `${i + 1}. ${item}` : `- ${item}`).join('\n') + '\n';
    }

    // ============================================================
    // ALERTS & STATUS
    // ============================================================

    static alert(message: string, type: 'success' | 'error' | 'warning' | 'info' = 'info'): string {
        const icons: Record<string, string> = { success: '✅', error: '❌', warning: '⚠️', info: 'ℹ️' };
        return `\n> ${icons[type]} **${type.toUpperCase()}**: ${message}\n`;
    }

    static success(message: string): string {
        return this.alert(message, 'success');
    }

    static error(message: string): string {
        return this.alert(message, 'error');
    }

    // ============================================================
    // EXPEDITION FORMATTERS
    // ============================================================

    static mage(mage: PacketMage): string {
        return `${mage.name} (${mage.sourceBox})`;
    }

    private static entity(entity: PacketEntity | null): string {
        return entity ? entity.name : '-';
    }

    static packet(packet: ExpeditionPacket): string {
        const { setting, meta } = packet;
        let output = this.header(`Expedition: ${setting.wave}`, '🗺️');
        output += this.keyValue({
            'Setting': setting.variant ? `${setting.wave} (${setting.variant})` : setting.wave,
            'Mood': setting.mood,
            'Themes': setting.themes.length > 0 ? setting.themes.join(', ') : undefined,
            'Protect': packet.protectTarget,
            'Length': meta.request.length,
            'Strictness': meta.request.strictness,
            'Seed': meta.requestedSeed ?? `${meta.rootSeed} (drawn)`,
            'Attempts': meta.attemptsTaken
        });
        output += `\n${setting.text}\n`;

        output += this.section('Mages');
        output += this.list(packet.mages.map(m => this.mage(m)));

        output += this.section('Battles');
        output += this.table(
            ['#', 'Tier', 'Nemesis', 'Friend', 'Foe'],
            packet.battles.map(b => [b.index, b.tier, b.nemesis.name, this.entity(b.friend), this.entity(b.foe)])
        );

        output += this.section('Rewards');
        output += this.table(
            ['After', 'Kind', 'Label'],
            packet.rewardSchedule.map(r => [
                r.afterBattle,
                r.kind,
                r.newMage ? `${r.label}: ${this.mage(r.newMage)}` : r.label
            ])
        );
        return output;
    }

    static violations(violations: readonly CollisionViolation[]): string {
        return this.list(violations.map(v => {
            const names = v.names.length > 0 ? ` [${v.names.join(', ')}]` : '';
            return `\`${v.code}\` ${v.message}${names}`;
        }));
    }

    static catalog(catalog: ExpeditionCatalog): string {
        let output = this.header('Expedition Catalog', '📚');
        output += this.table(
            ['Wave', 'Boxes', 'Variants', 'Xaxos', 'Mages', 'Nemeses', 'Friends', 'Foes'],
            catalog.waves.map(w => [
                w.id,
                w.boxes.join(', '),
                w.settingVariants.length > 0 ? w.settingVariants.join(', ') : '-',
                w.xaxosEligible ? 'yes' : 'no',
                w.counts.mages,
                w.counts.nemeses,
                w.counts.friends,
                w.counts.foes
            ])
        );
        output += this.keyValue({
            'Lengths': catalog.lengths.join(', '),
            'Strictness': catalog.strictnessModes.join(', ')
        });
        return output;
    }

    static story(story: StoryInputs): string {
        let output = this.header('Story Brief', '📖');
        output += this.keyValue({
            'Setting': story.setting.variant ? `${story.setting.wave} (${story.setting.variant})` : story.setting.wave,
            'Mood': story.setting.mood,
            'Protect': story.protectTarget,
            'Seed': story.seeds.effective
        });
        output += this.section('Mages');
        output += this.list(story.mages.map(m => m.storyNotes ? `${m.name}: ${m.storyNotes}` : m.name));
        output += this.section('Battles');
        output += this.list(story.battles.map(b => {
            const pair = b.friend && b.foe ? ` with ${b.friend} against ${b.foe}` : '';
            return `Tier ${b.tier}: ${b.nemesis}${pair}`;
        }), true);
        return output;
    }

    // ============================================================
    // JSON EMBEDDING (for frontend parsing)
    // ============================================================

    static embedJson(data: unknown, tag: string = 'DATA'): string {
        return `\n<!-- ${tag}_JSON\n${JSON.stringify(data)}\n${tag}_JSON -->\n`;
    }
}
