export const About = () => {
  return (
    <div className="container">
      <div className="row">
        <div className="span15 offset3">
          <h2>About</h2>
          <p>
            Top Stories Reader loads the thirty current top stories from the
            public Hacker News API, fetches every story at once and lists them
            by score. Stories that fail to load are left out of the list.
            Nothing is stored: every visit fetches fresh data.
          </p>
        </div>
      </div>
    </div>
  );
};
