/**
 * Toast notifications - a one-line message in a colored box
 */

import { fg, style, visibleLength } from '../ansi';
import { OutputSink, renderToString } from '../output';
import { frame } from './Box';

export type ToastType = 'info' | 'success' | 'warning' | 'error';

export const TOAST_TYPES: readonly ToastType[] = ['info', 'success', 'warning', 'error'];

interface ToastLook {
  color: string;
  icon: string;
  label: string;
}

const toastLooks: Record<ToastType, ToastLook> = {
  info: { color: fg.blue, icon: 'ℹ', label: 'INFO' },
  success: { color: fg.green, icon: '✓', label: 'SUCCESS' },
  warning: { color: fg.yellow, icon: '⚠', label: 'WARNING' },
  error: { color: fg.red, icon: '✗', label: 'ERROR' },
};

export interface ToastOptions {
  readonly showIcon: boolean;
  readonly showTimestamp: boolean;
  readonly width: number | null;
  readonly colorEnabled: boolean;
  readonly clock: () => Date;
}

const DEFAULT_OPTIONS: ToastOptions = Object.freeze({
  showIcon: true,
  showTimestamp: false,
  width: null,
  colorEnabled: true,
  clock: () => new Date(),
});

export class Toast {
  private readonly options: ToastOptions;

  constructor(
    readonly message: string,
    readonly type: ToastType = 'info',
    options: Partial<ToastOptions> = {}
  ) {
    this.options = Object.freeze({ ...DEFAULT_OPTIONS, ...options });
  }

  withIcon(showIcon: boolean): Toast {
    return this.with({ showIcon });
  }

  withTimestamp(showTimestamp: boolean): Toast {
    return this.with({ showTimestamp });
  }

  withWidth(width: number): Toast {
    return this.with({ width: Math.max(0, Math.floor(width)) });
  }

  withColors(colorEnabled: boolean): Toast {
    return this.with({ colorEnabled });
  }

  /**
   * Time source for the timestamp suffix
   */
  withClock(clock: () => Date): Toast {
    return this.with({ clock });
  }

  private with(changes: Partial<ToastOptions>): Toast {
    return new Toast(this.message, this.type, { ...this.options, ...changes });
  }

  /**
   * Text inside the box: icon, label, message and optional unix timestamp
   */
  content(): string {
    const look = toastLooks[this.type];
    let text = this.options.showIcon ? `${look.icon} ` : '';
    text += `${look.label}: ${this.message}`;

    if (this.options.showTimestamp) {
      const seconds = Math.floor(this.options.clock().getTime() / 1000);
      text += ` [${seconds}]`;
    }
    return text;
  }

  /**
   * Box width: requested width, but never less than content + 4
   */
  boxWidth(): number {
    const needed = visibleLength(this.content()) + 4;
    return this.options.width === null ? needed : Math.max(this.options.width, needed);
  }

  render(sink: OutputSink): void {
    const color = this.options.colorEnabled ? toastLooks[this.type].color : '';
    const lines = frame([this.content()], {
      width: this.boxWidth(),
      align: 'center',
      borderColor: color ? color + style.bold : '',
      contentColor: color,
    });

    for (const line of lines) {
      sink.write(line + '\n');
    }
  }

  toString(): string {
    return renderToString(sink => this.render(sink));
  }
}

export function showInfo(sink: OutputSink, message: string): void {
  new Toast(message, 'info').render(sink);
}

export function showSuccess(sink: OutputSink, message: string): void {
  new Toast(message, 'success').render(sink);
}

export function showWarning(sink: OutputSink, message: string): void {
  new Toast(message, 'warning').render(sink);
}

export function showError(sink: OutputSink, message: string): void {
  new Toast(message, 'error').render(sink);
}
