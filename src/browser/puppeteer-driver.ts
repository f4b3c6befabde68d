import puppeteer, { TimeoutError } from "puppeteer-core";
import type { Browser, ElementHandle, Page } from "puppeteer-core";
import { ServiceUnavailableError } from "../utils/errors.ts";
import type { Logger } from "../utils/logger.ts";
import { describeLocator } from "./driver.ts";
import type { DriverKey, Locator, NavigationDriver } from "./driver.ts";

const NAVIGATION_TIMEOUT_MS = 30_000;

export interface LaunchOptions {
  executablePath: string;
  headless: boolean;
  userDataDir?: string;
  tracePath?: string;
}

/** Translate a Locator into puppeteer's selector syntax (CSS + P-selectors). */
export function toSelector(locator: Locator): string {
  if ("css" in locator) return locator.css;
  if ("xpath" in locator) return `::-p-xpath(${locator.xpath})`;
  if ("text" in locator) return `::-p-text(${JSON.stringify(locator.text)})`;
  if ("role" in locator) {
    return `::-p-aria([name=${JSON.stringify(locator.name)}][role=${JSON.stringify(locator.role)}])`;
  }
  if ("label" in locator) return `::-p-aria(${JSON.stringify(locator.label)})`;
  return `[placeholder=${JSON.stringify(locator.placeholder)}]`;
}

export class PuppeteerDriver implements NavigationDriver<ElementHandle<Element>> {
  private readonly browser: Browser;
  private readonly page: Page;
  private readonly logger: Logger;
  private tracing: boolean;

  private constructor(browser: Browser, page: Page, logger: Logger, tracing: boolean) {
    this.browser = browser;
    this.page = page;
    this.logger = logger;
    this.tracing = tracing;
  }

  static async launch(options: LaunchOptions, logger: Logger): Promise<PuppeteerDriver> {
    logger.info("Launching browser...");
    let browser: Browser;
    try {
      browser = await puppeteer.launch({
        executablePath: options.executablePath,
        headless: options.headless,
        userDataDir: options.userDataDir,
        defaultViewport: { width: 1920, height: 1280 },
        args: ["--no-sandbox", "--disable-dev-shm-usage"],
      });
    } catch (err) {
      throw new ServiceUnavailableError("navigation", "Failed to launch browser", { cause: err });
    }

    const page = await browser.newPage();
    page.setDefaultNavigationTimeout(NAVIGATION_TIMEOUT_MS);

    if (options.tracePath) {
      await page.tracing.start({ path: options.tracePath, screenshots: true });
      logger.info(`Tracing to ${options.tracePath}`);
    }

    logger.info("Browser session started");
    return new PuppeteerDriver(browser, page, logger, Boolean(options.tracePath));
  }

  private async first(locator: Locator): Promise<ElementHandle<Element>> {
    const handle = await this.page.$(toSelector(locator));
    if (!handle) {
      throw new Error(`No element matches ${describeLocator(locator)}`);
    }
    return handle;
  }

  async goto(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: "domcontentloaded" });
  }

  async waitFor(locator: Locator, timeoutMs: number): Promise<boolean> {
    try {
      await this.page.waitForSelector(toSelector(locator), { timeout: timeoutMs });
      return true;
    } catch (err) {
      if (err instanceof TimeoutError) return false;
      throw err;
    }
  }

  async findAll(locator: Locator): Promise<ElementHandle<Element>[]> {
    return this.page.$$(toSelector(locator));
  }

  async count(locator: Locator): Promise<number> {
    const handles = await this.findAll(locator);
    await Promise.all(handles.map((h) => h.dispose()));
    return handles.length;
  }

  async isVisible(locator: Locator): Promise<boolean> {
    const handle = await this.page.$(toSelector(locator));
    if (!handle) return false;
    try {
      return await handle.isVisible();
    } finally {
      await handle.dispose();
    }
  }

  async isEnabled(locator: Locator): Promise<boolean> {
    const handle = await this.page.$(toSelector(locator));
    if (!handle) return false;
    try {
      return await handle.evaluate(
        (el) =>
          !(el instanceof HTMLButtonElement && el.disabled) &&
          el.getAttribute("aria-disabled") !== "true"
      );
    } finally {
      await handle.dispose();
    }
  }

  async scrollIntoView(handle: ElementHandle<Element>): Promise<void> {
    await handle.scrollIntoView();
  }

  async readText(handle: ElementHandle<Element>): Promise<string> {
    return handle.evaluate((el) =>
      el instanceof HTMLElement ? el.innerText : el.textContent ?? ""
    );
  }

  async click(handle: ElementHandle<Element>): Promise<void> {
    await handle.click();
  }

  async clickFirst(locator: Locator): Promise<void> {
    const handle = await this.first(locator);
    try {
      await handle.click();
    } finally {
      await handle.dispose();
    }
  }

  async fill(locator: Locator, value: string): Promise<void> {
    const handle = await this.first(locator);
    try {
      const isRange = await handle.evaluate(
        (el) => el instanceof HTMLInputElement && el.type === "range"
      );
      if (isRange) {
        await handle.evaluate((el, v) => {
          if (!(el instanceof HTMLInputElement)) return;
          el.value = v;
          el.dispatchEvent(new Event("input", { bubbles: true }));
          el.dispatchEvent(new Event("change", { bubbles: true }));
        }, value);
        return;
      }
      await handle.evaluate((el) => {
        if (el instanceof HTMLInputElement || el instanceof HTMLTextAreaElement) el.value = "";
      });
      await handle.type(value);
    } finally {
      await handle.dispose();
    }
  }

  async press(locator: Locator, key: DriverKey): Promise<void> {
    const handle = await this.first(locator);
    try {
      await handle.press(key);
    } finally {
      await handle.dispose();
    }
  }

  async textOf(locator: Locator, timeoutMs: number): Promise<string | null> {
    let handle: ElementHandle<Element> | null;
    try {
      handle = await this.page.waitForSelector(toSelector(locator), { timeout: timeoutMs });
    } catch (err) {
      if (err instanceof TimeoutError) return null;
      throw err;
    }
    if (!handle) return null;
    try {
      return await this.readText(handle);
    } finally {
      await handle.dispose();
    }
  }

  async attributeOf(locator: Locator, name: string): Promise<string | null> {
    const handle = await this.page.$(toSelector(locator));
    if (!handle) return null;
    try {
      return await handle.evaluate((el, attr) => el.getAttribute(attr), name);
    } finally {
      await handle.dispose();
    }
  }

  async close(): Promise<void> {
    this.logger.info("Closing browser");
    if (this.tracing) {
      this.tracing = false;
      await this.page.tracing.stop();
    }
    await this.browser.close();
  }
}
