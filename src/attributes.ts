/**
 * @module
 * Attributes and options applied to every render job.
 */
import type {
    AttributeSet,
    AttributeValue,
    BackendType,
} from './render-job';

/**
 * Attributes applied to every render job, whatever its backend.
 *
 * Missing attribute references only warn here; the conventions separately make
 * every warning fatal, so they still fail the build.
 */
export function commonAttributes(today: Date): AttributeSet {
    return Object.freeze({
        'attribute-missing': 'warn',
        'docinfo': 'shared',
        'icons': 'font',
        'idprefix': '',
        'idseparator': '-',
        'sectanchors': '',
        'sectnums': '',
        'today-year': today.getFullYear(),
    });
}

/**
 * Attributes applied to HTML render jobs only.
 */
export function htmlOnlyAttributes(): AttributeSet {
    return Object.freeze({
        'highlightjs-theme': 'github',
        'highlightjsdir': 'js/highlight',
        'icons': 'font',
        'linkcss': true,
        'source-highlighter': 'highlight.js',
        'stylesheet': 'css/spring.css',
    });
}

/**
 * Options applied to every render job.
 */
export function documentOptions(): AttributeSet {
    return Object.freeze({
        doctype: 'book',
    });
}

/**
 * Union of attribute sets; a key written by a later set wins.
 */
export function mergeAttributes(...sets: AttributeSet[]): AttributeSet {
    const merged: Record<string, AttributeValue> = {};
    for (const set of sets)
        for (const [key, value] of Object.entries(set))
            merged[key] = value;
    return Object.freeze(merged);
}

/**
 * The attributes for a render job of the given backend type:
 * common attributes, then HTML-only ones for HTML jobs.
 */
export function composeAttributes(backendType: BackendType, today: Date): AttributeSet {
    if (backendType === 'html')
        return mergeAttributes(commonAttributes(today), htmlOnlyAttributes());
    return commonAttributes(today);
}
