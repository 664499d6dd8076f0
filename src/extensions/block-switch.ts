/**
 * @module
 * Asciidoctor extension that turns a `primary` listing block followed by
 * `secondary` ones into a single block with a switch between them.
 *
 * ```
 * [source,java,role="primary"]
 * .Java
 * ----
 * ...
 * ----
 *
 * [source,kotlin,role="secondary"]
 * .Kotlin
 * ----
 * ...
 * ----
 * ```
 */

/** Class of each item of the switch; also used to recognize pages rendered with this extension. */
export const SWITCH_ITEM_CLASS = 'switch--item';

const STYLE = `<style>
.hidden { display: none; }
.switch { border-width: 1px 1px 0 1px; border-style: solid; border-color: #7a2518; display: inline-block; }
.${SWITCH_ITEM_CLASS} { padding: 10px; background-color: #ffffff; color: #7a2518; display: inline-block; cursor: pointer; }
.${SWITCH_ITEM_CLASS}.selected { background-color: #7a2519; color: #ffffff; }
</style>`;

const SCRIPT = `<script type="text/javascript">
function addBlockSwitches() {
  document.querySelectorAll('.primary').forEach(function (primary) {
    var switchItem = createSwitchItem(primary, createBlockSwitch(primary));
    switchItem.item.classList.add('selected');
    var title = primary.querySelector('.title');
    if (title) title.remove();
  });
  document.querySelectorAll('.secondary').forEach(function (secondary) {
    var primary = findPrimary(secondary);
    if (primary === null) return;
    var switchItem = createSwitchItem(secondary, primary.querySelector('.switch'));
    switchItem.content.classList.add('hidden');
    primary.append(switchItem.content);
    secondary.remove();
  });
}
function createElementFromHtml(html) {
  var template = document.createElement('template');
  template.innerHTML = html;
  return template.content.firstChild;
}
function createBlockSwitch(primary) {
  var blockSwitch = createElementFromHtml('<div class="switch"></div>');
  primary.prepend(blockSwitch);
  return blockSwitch;
}
function findPrimary(secondary) {
  var candidate = secondary.previousElementSibling;
  while (candidate != null && !candidate.classList.contains('primary')) candidate = candidate.previousElementSibling;
  return candidate;
}
function triggerSwitch(event) {
  var selected = event.target;
  selected.parentNode.querySelectorAll('.${SWITCH_ITEM_CLASS}').forEach(function (item) {
    item.classList.remove('selected');
  });
  selected.classList.add('selected');
  selected.parentNode.parentNode.querySelectorAll('.content').forEach(function (content, index) {
    content.classList.toggle('hidden', index !== Array.prototype.indexOf.call(selected.parentNode.children, selected));
  });
}
function createSwitchItem(block, blockSwitch) {
  var title = block.querySelector('.title');
  var blockName = title ? title.textContent : 'Default';
  var content = block.querySelector('.content');
  var item = createElementFromHtml('<div class="${SWITCH_ITEM_CLASS}">' + blockName + '</div>');
  item.addEventListener('click', triggerSwitch);
  blockSwitch.append(item);
  return { item: item, content: content };
}
window.addEventListener('load', addBlockSwitches);
</script>`;

/**
 * The part of a document the docinfo content is added to.
 */
export interface DocinfoDocument {
    isBasebackend(base: string): boolean;
}

/**
 * DSL available to a docinfo processor definition.
 */
export interface DocinfoProcessorDsl {
    atLocation(location: 'head' | 'footer'): void;
    process(fn: (doc: DocinfoDocument) => string): void;
}

/**
 * The part of an Asciidoctor extension registry this extension uses.
 */
export interface DocinfoRegistry {
    docinfoProcessor(block: (this: DocinfoProcessorDsl) => void): unknown;
}

/**
 * Returns the markup added to the head of HTML documents.
 */
export function blockSwitchDocinfo(): string {
    return `${STYLE}\n${SCRIPT}`;
}

/**
 * Registers the block switch with `registry`.
 */
export function register(registry: DocinfoRegistry): void {
    registry.docinfoProcessor(function () {
        this.atLocation('head');
        this.process(doc => doc.isBasebackend('html') ? blockSwitchDocinfo() : '');
    });
}
