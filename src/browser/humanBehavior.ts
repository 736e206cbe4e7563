/**
 * Human pacing inside the browser: log-normal pauses, curved mouse paths,
 * character-by-character typing and reading scrolls.
 */

import { Page } from 'playwright-core';

function randomLogNormal(mean: number, stdDev: number): number {
    let u = 0, v = 0;
    while (u === 0) u = Math.random();
    while (v === 0) v = Math.random();
    const z = Math.sqrt(-2.0 * Math.log(u)) * Math.cos(2.0 * Math.PI * v);
    const mu = Math.log(mean) - 0.5 * Math.log(1 + (stdDev / mean) ** 2);
    const sigma = Math.sqrt(Math.log(1 + (stdDev / mean) ** 2));
    return Math.exp(mu + sigma * z);
}

/**
 * Pause drawn from a skewed log-normal: mostly short, with an occasional
 * long tail.
 */
export async function humanDelay(page: Page, min: number = 800, max: number = 2000): Promise<void> {
    const mean = min + (max - min) * 0.35;
    const std = Math.max(1, (max - min) / 3);
    const raw = randomLogNormal(mean, std);
    const asymmetricDelay = Math.random() < 0.15 ? raw * (1.5 + Math.random()) : raw;
    const delay = Math.round(Math.max(min, Math.min(max * 2.5, asymmetricDelay)));
    await page.waitForTimeout(delay);
}

/** Moves the cursor along a two-leg curve onto the element before it is clicked. */
export async function humanMouseMove(page: Page, targetSelector: string): Promise<void> {
    const box = await page.locator(targetSelector).first().boundingBox();
    if (!box) return;

    const startX = 100 + Math.random() * 300;
    const startY = 100 + Math.random() * 200;
    await page.mouse.move(startX, startY, { steps: 10 });

    const curveFactor = Math.random() < 0.5 ? 1 : -1;
    const midX = startX + (box.x - startX) * 0.4 + (Math.random() * 40 * curveFactor);
    const midY = startY + (box.y - startY) * 0.6 + (Math.random() * 40 * -curveFactor);
    await page.mouse.move(midX, midY, { steps: Math.floor(6 + Math.random() * 5) });
    await page.waitForTimeout(20 + Math.random() * 40);

    const finalX = box.x + box.width / 2 + (Math.random() * 8 - 4);
    const finalY = box.y + box.height / 2 + (Math.random() * 8 - 4);
    await page.mouse.move(finalX, finalY, { steps: Math.floor(8 + Math.random() * 6) });
}

export async function simulateHumanReading(page: Page): Promise<void> {
    const scrollCount = 2 + Math.floor(Math.random() * 4);
    for (let i = 0; i < scrollCount; i++) {
        const deltaY = 150 + Math.random() * 380;
        await page.mouse.wheel(0, deltaY);
        await humanDelay(page, 500, 1500);
    }
}
