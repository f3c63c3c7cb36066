export type NavigationState<TView extends string> = {
  root: TView
  active: TView
  /** Previously active views, most recent last. Never contains `active`. */
  history: TView[]
}

export const createNavigation = <TView extends string>(root: TView): NavigationState<TView> => ({
  root,
  active: root,
  history: [],
})

export const pushView = <TView extends string>(nav: NavigationState<TView>, view: TView): NavigationState<TView> => {
  // The active view is never also in the history: pushing the active view is a no-op, and
  // pushing a view already in the history unwinds back to it.
  if (view === nav.active) {
    return nav
  }
  const existing = nav.history.indexOf(view)
  if (existing >= 0) {
    return { ...nav, active: view, history: nav.history.slice(0, existing) }
  }
  return { ...nav, active: view, history: [...nav.history, nav.active] }
}

export const popView = <TView extends string>(nav: NavigationState<TView>): NavigationState<TView> => {
  const previous = nav.history[nav.history.length - 1]
  if (previous === undefined) {
    return { ...nav, active: nav.root, history: [] }
  }
  return { ...nav, active: previous, history: nav.history.slice(0, -1) }
}

export const resetToRoot = <TView extends string>(nav: NavigationState<TView>): NavigationState<TView> => ({
  ...nav,
  active: nav.root,
  history: [],
})
