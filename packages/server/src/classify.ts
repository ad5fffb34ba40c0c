// Maps a focused-window title to an activity label such as
// "GitHub / owner/repo / Pull Request / #12 Fix parser".

const BROWSERS = ["qutebrowser", "Mozilla Firefox", "Chromium", "Google Chrome"];

const PROGRESS_PREFIX = /^\[\d{1,3}%\] /;
const GITHUB_PAGE = /^(.*) · (Pull Request|Issue|Discussion) #(\d+) · (.*)$/;
const TMUX = /^(.*) \(tmux:([^/]*)\/(.*)\)$/;

export const LABEL_SEPARATOR = " / ";

function splitBrowser(title: string): { browser: string; page: string } | null {
  for (const browser of BROWSERS) {
    const suffix = ` - ${browser}`;
    if (title.endsWith(suffix)) {
      return { browser, page: title.slice(0, -suffix.length).replace(PROGRESS_PREFIX, "") };
    }
  }
  return null;
}

/** Path from the most general to the most specific part of the title. */
export function titleToPath(rawTitle: string): string[] {
  const title = rawTitle.trim();

  const tmux = TMUX.exec(title);
  if (tmux) {
    return ["tmux", tmux[2], tmux[3], tmux[1]];
  }

  const browser = splitBrowser(title);
  if (browser) {
    if (browser.page === "Notifications") {
      return ["GitHub", "Notifications"];
    }
    const github = GITHUB_PAGE.exec(browser.page);
    if (github) {
      return ["GitHub", github[4], github[2], `#${github[3]} ${github[1]}`];
    }
    return [browser.browser, browser.page];
  }

  return [title];
}
