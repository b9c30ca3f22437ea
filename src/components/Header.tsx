import { Link } from "react-router-dom";

export const Header = () => {
  return (
    <header className="row">
      <div className="logo span5">
        <h1>
          <Link to="/">Top Stories Reader</Link>
        </h1>
        <h3>
          the current front page of{" "}
          <a href="https://news.ycombinator.com">hacker news</a>, by score
        </h3>
      </div>
      <div className="span9 offset1">
        <ul className="mainnav nav nav-pills pull-right">
          <li>
            <Link className="about" to="/about">
              about
            </Link>
          </li>
        </ul>
      </div>
    </header>
  );
};
