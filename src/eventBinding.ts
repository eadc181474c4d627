import type { BufferId, Disposable, EditorHost, Viewport, ViewportChangeEvent } from './dataStructures';
import { type Configuration, type ConfigurationOptions, DEFAULT_CONFIG, compileFiletypePatterns, isIgnoredFiletype, mergeConfig } from './configuration';
import type { OverlayStore } from './overlayStore';
import { RenderEngine } from './renderEngine';

/**
 * Process-wide on/off switch, initially on
 */
export class EnableFlag {
    constructor(private value: boolean = true) {}

    public get enabled(): boolean {
        return this.value;
    }

    /**
     * Flip the flag and return the new value
     */
    public flip(): boolean {
        this.value = !this.value;
        return this.value;
    }
}

/**
 * Connects viewport-change notifications and the toggle command to the
 * render engine
 */
export class RelativeLineController {
    private config: Configuration;
    private ignorePatterns: RegExp[];
    private readonly engine: RenderEngine;
    private subscription: Disposable | undefined;

    constructor(
        private readonly host: EditorHost,
        private readonly store: OverlayStore,
        private readonly flag: EnableFlag = new EnableFlag(),
        options?: ConfigurationOptions
    ) {
        this.config = mergeConfig(DEFAULT_CONFIG, options);
        this.ignorePatterns = compileFiletypePatterns(this.config.ignoredFiletypes);
        this.engine = new RenderEngine(host, store);
    }

    public get configuration(): Configuration {
        return this.config;
    }

    public get enabled(): boolean {
        return this.flag.enabled;
    }

    /**
     * Start listening for viewport changes
     */
    public attach(): void {
        if (this.subscription) {
            return;
        }
        this.subscription = this.host.onViewportChange(event => this.handleViewportChange(event));
        console.log('Relative line annotations attached to viewport changes');
    }

    /**
     * Merge new options over the current configuration and redraw
     */
    public setup(options?: ConfigurationOptions): Configuration {
        this.config = mergeConfig(this.config, options);
        this.ignorePatterns = compileFiletypePatterns(this.config.ignoredFiletypes);
        console.log(`Configuration updated (ignored filetypes: ${this.config.ignoredFiletypes.length})`);
        this.refreshCurrentWindow();
        return this.config;
    }

    public isIgnored(buffer: BufferId): boolean {
        return isIgnoredFiletype(this.host.filetype(buffer), this.ignorePatterns);
    }

    /**
     * Redraw the affected window. While disabled, clear the buffer instead;
     * ignored filetypes are never touched.
     */
    public handleViewportChange(event: ViewportChangeEvent): void {
        if (this.isIgnored(event.bufferId)) {
            return;
        }
        if (!this.flag.enabled) {
            this.store.batch(() => this.store.clearAll(event.bufferId));
            return;
        }

        try {
            this.store.batch(() => this.engine.render(event.bufferId, event.windowId, this.config));
        } catch (error) {
            // The next viewport change supersedes the failed render
            console.error(`Failed to render relative numbers (${event.kind}) for ${event.bufferId}:`, error);
        }
    }

    /**
     * Flip the global flag; clear the current buffer when turning off,
     * redraw the current window when turning on
     */
    public toggle(): boolean {
        const enabled = this.flag.flip();
        console.log(`Relative line annotations ${enabled ? 'enabled' : 'disabled'}`);

        if (enabled) {
            this.refreshCurrentWindow();
            return enabled;
        }

        const viewport = this.currentViewport();
        if (viewport && !this.isIgnored(viewport.bufferId)) {
            this.store.batch(() => this.store.clearAll(viewport.bufferId));
        }
        return enabled;
    }

    /**
     * Same as a cursor move in the current window
     */
    public refreshCurrentWindow(): void {
        const viewport = this.currentViewport();
        if (!viewport) {
            return;
        }
        this.handleViewportChange({
            kind: 'cursor-moved',
            bufferId: viewport.bufferId,
            windowId: viewport.windowId
        });
    }

    public dispose(): void {
        if (this.subscription) {
            this.subscription.dispose();
            this.subscription = undefined;
        }
    }

    private currentViewport(): Viewport | undefined {
        const window = this.host.currentWindow();
        return window === undefined ? undefined : this.host.viewport(window);
    }
}
