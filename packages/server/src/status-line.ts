import type { StatusSnapshot } from "@blockbar/shared";
import { fadeBetween } from "./color.js";
import type { DisplayConfig } from "./config.js";
import type { RejectionSeverity } from "./errors.js";

function clock(seconds: number): string {
  const minutes = Math.floor(seconds / 60);
  return `${String(minutes).padStart(2, "0")}:${String(seconds % 60).padStart(2, "0")}`;
}

function markup(foreground: string, background: string | null, text: string): string {
  return `<fc=${foreground}${background ? `,${background}` : ""}>${text}</fc>`;
}

/**
 * Renders snapshots as xmobar markup. Holds the countdown of any pending flash,
 * so each call to render consumes one flash frame.
 */
export class StatusLine {
  private warningFrames = 0;
  private errorFrames = 0;

  constructor(private readonly config: DisplayConfig) {}

  flash(severity: RejectionSeverity): void {
    if (severity === "error") {
      this.errorFrames = this.config.errorFlashTicks;
    } else {
      this.warningFrames = this.config.warningFlashTicks;
    }
  }

  render(snapshot: StatusSnapshot): string {
    const config = this.config;
    let background: string | null = null;

    if (this.warningFrames > 0) {
      if (this.warningFrames % 2 === 1) background = config.warningColor;
      this.warningFrames -= 1;
    }
    if (this.errorFrames > 0) {
      if (this.errorFrames % 2 === 1) background = config.errorColor;
      this.errorFrames -= 1;
    }

    const seconds = snapshot.remainingSeconds;
    const blinking = seconds < config.finalCountdownSeconds && seconds % 2 === 1;

    switch (snapshot.state) {
      case "idle":
        return markup(config.idleColor, background, "--");
      case "paused":
        return markup(config.idleColor, background, clock(seconds));
      case "running":
        return markup(
          fadeBetween(config.blockStartColor, config.blockEndColor, snapshot.elapsedFraction),
          blinking ? config.warningColor : background,
          clock(seconds)
        );
      case "cooldown":
        return markup(
          fadeBetween(config.cooldownStartColor, config.cooldownEndColor, snapshot.elapsedFraction),
          blinking ? config.warningColor : background,
          `${config.cooldownMarker}${clock(seconds)}`
        );
    }
  }
}
