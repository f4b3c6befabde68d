/**
 * How the pipeline addresses things on a page. Drivers translate these
 * into their own selector syntax.
 */
export type Locator =
  | { css: string }
  | { xpath: string }
  | { text: string }
  | { role: string; name: string }
  | { label: string }
  | { placeholder: string };

export type DriverKey = "Enter" | "Tab" | "Escape" | "ArrowLeft" | "ArrowRight";

/**
 * A single shared, stateful browser session. Not safe for concurrent use:
 * callers await every call before issuing the next one.
 *
 * `H` is the driver's element handle type; the pipeline never looks
 * inside it.
 */
export interface NavigationDriver<H> {
  goto(url: string): Promise<void>;
  /** Resolves false when nothing matched before the timeout. */
  waitFor(locator: Locator, timeoutMs: number): Promise<boolean>;
  findAll(locator: Locator): Promise<H[]>;
  count(locator: Locator): Promise<number>;
  isVisible(locator: Locator): Promise<boolean>;
  isEnabled(locator: Locator): Promise<boolean>;

  scrollIntoView(handle: H): Promise<void>;
  readText(handle: H): Promise<string>;
  click(handle: H): Promise<void>;

  clickFirst(locator: Locator): Promise<void>;
  fill(locator: Locator, value: string): Promise<void>;
  press(locator: Locator, key: DriverKey): Promise<void>;
  /** Text of the first match, or null if none appeared in time. */
  textOf(locator: Locator, timeoutMs: number): Promise<string | null>;
  attributeOf(locator: Locator, name: string): Promise<string | null>;

  close(): Promise<void>;
}

export function describeLocator(locator: Locator): string {
  if ("css" in locator) return locator.css;
  if ("xpath" in locator) return `xpath=${locator.xpath}`;
  if ("text" in locator) return `text=${locator.text}`;
  if ("role" in locator) return `${locator.role}[name="${locator.name}"]`;
  if ("label" in locator) return `label=${locator.label}`;
  return `placeholder=${locator.placeholder}`;
}
